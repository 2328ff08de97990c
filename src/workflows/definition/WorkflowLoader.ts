import * as yaml from 'yaml';
import { z } from 'zod';
import { WorkflowDefinitionError, errorMessage } from '../../core/errors';

const taskDefinitionSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  agent: z.string().min(1).optional(),
  dependsOn: z.array(z.string().min(1)).default([]),
});

const workflowDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  tasks: z.array(taskDefinitionSchema).min(1),
});

export type TaskDefinition = z.infer<typeof taskDefinitionSchema>;
export type WorkflowDefinition = z.infer<typeof workflowDefinitionSchema>;

/**
 * Reads a workflow from YAML or JSON text. Dependencies may point at tasks
 * declared later; whether they are met is decided when the workflow runs.
 */
export function parseWorkflowDefinition(source: string): WorkflowDefinition {
  let raw: unknown;
  try {
    raw = yaml.parse(source);
  } catch (error) {
    throw new WorkflowDefinitionError('Workflow is not valid YAML or JSON: ' + errorMessage(error), { cause: error });
  }

  const parsed = workflowDefinitionSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new WorkflowDefinitionError('Invalid workflow definition: ' + issues.join('; '));
  }

  const seen = new Set<string>();
  for (const task of parsed.data.tasks) {
    if (seen.has(task.id)) {
      throw new WorkflowDefinitionError(`Duplicate task id '${task.id}' in workflow '${parsed.data.name}'`);
    }
    seen.add(task.id);
  }

  return parsed.data;
}
