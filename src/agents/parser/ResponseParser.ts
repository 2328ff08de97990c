import { AgentStep, ParsingStrategy } from '../../core/types';

export const FINISH_ACTION = 'FINISH';
/** Key under which undecodable ACTION_INPUT text is kept. */
export const RAW_INPUT_KEY = 'raw';

/**
 * One prompting convention: how the model is told to answer and how its
 * replies are read back. Parsing never throws; a reply with no usable action
 * yields a step without `action`, and the loop answers it with `retryPrompt`.
 */
export interface ResponseParser {
  readonly strategy: ParsingStrategy;
  readonly retryPrompt: string;
  formatInstructions(): string;
  parse(reply: string, stepNumber: number): AgentStep;
}

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function tryParseObject(text: string): JsonObject | null {
  try {
    const value: unknown = JSON.parse(text);
    return isJsonObject(value) ? value : null;
  } catch {
    return null;
  }
}

function answerText(value: unknown): string {
  if (value === undefined || value === null) return '';
  return typeof value === 'string' ? value.trim() : JSON.stringify(value);
}

/**
 * Returns the first `{...}` starting at `from` whose braces balance, skipping
 * braces inside string literals. Falls back to the shortest `{...}` span when
 * nothing balances.
 */
export function extractJsonObject(text: string, from: number = 0): string | null {
  const start = text.indexOf('{', from);
  if (start === -1) return null;

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') depth++;
    else if (ch === '}') {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  const end = text.indexOf('}', start);
  return end === -1 ? null : text.slice(start, end + 1);
}

const THOUGHT_PATTERN = /THOUGHT:\s*([\s\S]*?)(?=ACTION:|$)/i;
const ACTION_PATTERN = /ACTION:\s*(\w+)/i;
const ACTION_INPUT_PATTERN = /ACTION_INPUT:\s*/i;

export class ReactResponseParser implements ResponseParser {
  readonly strategy = 'react' as const;
  readonly retryPrompt = 'Please follow the format: THOUGHT, ACTION, ACTION_INPUT';

  formatInstructions(): string {
    return `You operate using the ReAct pattern (Reasoning and Acting).

For EACH step, you MUST use this EXACT format:

THOUGHT: [Your reasoning about what to do next]
ACTION: [tool_name]
ACTION_INPUT: {"param": "value"}

After getting results, continue thinking:

THOUGHT: [Your reasoning about the observation]
ACTION: [next_tool or ${FINISH_ACTION}]
ACTION_INPUT: {"param": "value"}

When you have the final answer, use:

THOUGHT: [Your final reasoning]
ACTION: ${FINISH_ACTION}
ACTION_INPUT: {"answer": "Your complete final answer here"}

Rules:
1. ALWAYS start with THOUGHT
2. Use tools when you need real data
3. You can use multiple tools in sequence
4. ALWAYS end with ACTION: ${FINISH_ACTION}
5. If a tool fails, try a different approach`;
  }

  parse(reply: string, stepNumber: number): AgentStep {
    const step: AgentStep = { stepNumber, thought: '', isFinal: false };

    const thought = THOUGHT_PATTERN.exec(reply);
    if (thought?.[1] !== undefined) {
      step.thought = thought[1].trim();
    }

    const action = ACTION_PATTERN.exec(reply);
    if (action?.[1]) {
      step.action = action[1];
    }

    const inputMarker = ACTION_INPUT_PATTERN.exec(reply);
    if (inputMarker) {
      const candidate = extractJsonObject(reply, inputMarker.index + inputMarker[0].length);
      if (candidate !== null) {
        step.actionInput = tryParseObject(candidate) ?? { [RAW_INPUT_KEY]: candidate };
      }
    }

    if (step.action && step.action.toUpperCase() === FINISH_ACTION) {
      step.isFinal = true;
      step.finalAnswer = answerText(step.actionInput?.['answer']) || step.thought || reply.trim() || reply;
    }

    return step;
  }
}

export class JsonResponseParser implements ResponseParser {
  readonly strategy = 'json' as const;
  readonly retryPrompt = 'Good, continue.';

  formatInstructions(): string {
    return `To use a tool, respond with EXACTLY this JSON format:
{"action": "tool", "tool_name": "tool_name_here", "parameters": {"param1": "value1"}}

When you have the final answer:
{"action": "answer", "content": "your final answer here"}

When you need to think:
{"action": "think", "content": "your thought process"}

Rules:
1. Always respond with valid JSON
2. Think before answering
3. If you don't know, say so honestly
4. Use tools when they can help`;
  }

  parse(reply: string, stepNumber: number): AgentStep {
    const decoded = this.decode(reply);
    const content = typeof decoded['content'] === 'string' ? decoded['content'] : '';

    switch (decoded['action']) {
      case 'think':
        return { stepNumber, thought: content, isFinal: false };
      case 'tool': {
        const toolName = typeof decoded['tool_name'] === 'string' ? decoded['tool_name'].trim() : '';
        const params = decoded['parameters'];
        return {
          stepNumber,
          thought: content,
          action: toolName || undefined,
          actionInput: isJsonObject(params) ? params : {},
          isFinal: false,
        };
      }
      default: {
        const answer = content.trim() ? content : reply.trim() || reply;
        return { stepNumber, thought: content, isFinal: true, finalAnswer: answer };
      }
    }
  }

  private decode(reply: string): JsonObject {
    const whole = tryParseObject(reply);
    if (whole) return whole;

    const start = reply.indexOf('{');
    const end = reply.lastIndexOf('}');
    if (start !== -1 && end > start) {
      const inner = tryParseObject(reply.slice(start, end + 1));
      if (inner) return inner;
    }

    return { action: 'answer', content: reply };
  }
}

export function createResponseParser(strategy: ParsingStrategy): ResponseParser {
  switch (strategy) {
    case 'react':
      return new ReactResponseParser();
    case 'json':
      return new JsonResponseParser();
  }
}
