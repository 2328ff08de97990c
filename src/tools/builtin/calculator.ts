type Token =
  | { type: 'number'; value: number }
  | { type: 'ident'; value: string }
  | { type: 'op'; value: string };

const FUNCTIONS = new Map<string, (...args: number[]) => number>([
  ['abs', Math.abs],
  ['round', Math.round],
  ['min', Math.min],
  ['max', Math.max],
  ['sqrt', Math.sqrt],
  ['sin', Math.sin],
  ['cos', Math.cos],
  ['tan', Math.tan],
  ['log', Math.log],
  ['log10', Math.log10],
  ['pow', Math.pow],
]);

const CONSTANTS = new Map<string, number>([
  ['pi', Math.PI],
  ['e', Math.E],
]);

const TOKEN_PATTERN = /\s*(?:(\d+\.?\d*(?:[eE][+-]?\d+)?|\.\d+(?:[eE][+-]?\d+)?)|([A-Za-z_]\w*)|(\*\*|[-+*/%(),]))/y;

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  TOKEN_PATTERN.lastIndex = 0;
  let position = 0;

  while (position < expression.length) {
    if (expression.slice(position).trim() === '') break;
    TOKEN_PATTERN.lastIndex = position;
    const match = TOKEN_PATTERN.exec(expression);
    if (!match) {
      throw new Error(`unexpected character '${expression.slice(position).trim()[0]}'`);
    }
    position = TOKEN_PATTERN.lastIndex;
    if (match[1] !== undefined) tokens.push({ type: 'number', value: Number(match[1]) });
    else if (match[2] !== undefined) tokens.push({ type: 'ident', value: match[2] });
    else if (match[3] !== undefined) tokens.push({ type: 'op', value: match[3] });
  }

  return tokens;
}

/**
 * Recursive-descent evaluator for plain arithmetic. Only the names in
 * FUNCTIONS and CONSTANTS resolve; anything else is rejected.
 */
class Evaluator {
  private index = 0;

  constructor(private readonly tokens: Token[]) {}

  evaluate(): number {
    const value = this.expression();
    if (this.index < this.tokens.length) {
      throw new Error('unexpected trailing input');
    }
    return value;
  }

  private peekOp(...ops: string[]): string | null {
    const token = this.tokens[this.index];
    return token?.type === 'op' && ops.includes(token.value) ? token.value : null;
  }

  private expect(op: string): void {
    if (!this.peekOp(op)) throw new Error(`expected '${op}'`);
    this.index++;
  }

  private expression(): number {
    let value = this.term();
    for (let op = this.peekOp('+', '-'); op; op = this.peekOp('+', '-')) {
      this.index++;
      const right = this.term();
      value = op === '+' ? value + right : value - right;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp('*', '/', '%'); op; op = this.peekOp('*', '/', '%')) {
      this.index++;
      const right = this.unary();
      if (op !== '*' && right === 0) throw new Error('division by zero');
      value = op === '*' ? value * right : op === '/' ? value / right : value % right;
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp('+', '-');
    if (op) {
      this.index++;
      const operand = this.unary();
      return op === '-' ? -operand : operand;
    }
    return this.power();
  }

  // ** is right-associative and binds tighter than a unary minus on its left.
  private power(): number {
    const base = this.primary();
    if (this.peekOp('**')) {
      this.index++;
      return Math.pow(base, this.unary());
    }
    return base;
  }

  private primary(): number {
    const token = this.tokens[this.index];
    if (!token) throw new Error('unexpected end of expression');
    this.index++;

    if (token.type === 'number') return token.value;

    if (token.type === 'ident') {
      const fn = FUNCTIONS.get(token.value);
      const constant = CONSTANTS.get(token.value);
      if (fn && this.peekOp('(')) {
        return fn(...this.callArguments());
      }
      if (constant !== undefined) return constant;
      throw new Error(`'${token.value}' is not allowed`);
    }

    if (token.value === '(') {
      const value = this.expression();
      this.expect(')');
      return value;
    }

    throw new Error(`unexpected '${token.value}'`);
  }

  private callArguments(): number[] {
    this.expect('(');
    const args: number[] = [];
    if (this.peekOp(')')) {
      this.index++;
      return args;
    }
    args.push(this.expression());
    while (this.peekOp(',')) {
      this.index++;
      args.push(this.expression());
    }
    this.expect(')');
    return args;
  }
}

export function evaluateExpression(expression: string): number {
  return new Evaluator(tokenize(expression)).evaluate();
}

export function calculate(expression: string): string {
  return `${expression} = ${evaluateExpression(expression)}`;
}
