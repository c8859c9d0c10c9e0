import { execa } from 'execa';
import { z } from 'zod';
import type { CodeGenerator, FeaturePlanner, GenerationResult, Integrator } from '../core/collaborators.js';
import { CollaboratorError } from '../core/errors.js';
import type { Chunk, ChunkPlan } from '../core/types.js';

export const ChunkPlanSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  files: z.array(z.string().min(1)),
  dependencies: z.array(z.string().min(1)).default([]),
  estimatedEffort: z.number().int().min(1).max(10).optional()
});

const PlanResponse = z.object({ chunks: z.array(ChunkPlanSchema) });
const GenerateResponse = z.object({
  files: z.record(z.string()),
  commitMessage: z.string().min(1)
});
const OpenResponse = z.object({ handle: z.union([z.string().min(1), z.number()]).transform(String) });
const CompleteResponse = z.object({ merged: z.boolean() });
const FailureResponse = z.object({ error: z.string(), retryable: z.boolean().default(true) });

export interface CommandOptions {
  timeoutMs: number;
}

/**
 * Runs `command` (executable, then its own arguments) with `operation`
 * appended, the JSON request on stdin, and parses the JSON document it prints.
 * A non-zero exit is a retryable failure unless the command printed
 * `{"error": "...", "retryable": false}`.
 */
export async function callCommand<T extends z.ZodTypeAny>(
  command: string[] | undefined,
  envName: string,
  operation: string,
  request: unknown,
  schema: T,
  opts: CommandOptions
): Promise<z.output<T>> {
  const [file, ...args] = command ?? [];
  if (!file) {
    throw new CollaboratorError(`No command configured for ${operation} (set ${envName})`, false);
  }

  const result = await execa(file, [...args, operation], {
    input: JSON.stringify(request),
    timeout: opts.timeoutMs,
    reject: false
  });

  if (result.timedOut) {
    throw new CollaboratorError(`${operation} timed out after ${opts.timeoutMs}ms`, true);
  }
  if (result.failed) {
    const reported = FailureResponse.safeParse(tryJson(result.stdout));
    if (reported.success) throw new CollaboratorError(reported.data.error, reported.data.retryable);
    const detail = result.stderr.trim() || `exit code ${result.exitCode}`;
    throw new CollaboratorError(`${operation} failed: ${detail}`, true);
  }

  const parsed = schema.safeParse(tryJson(result.stdout));
  if (!parsed.success) {
    const msg = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new CollaboratorError(`${operation} returned an invalid response: ${msg}`, true);
  }
  return parsed.data;
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class CommandPlanner implements FeaturePlanner {
  constructor(private command: string[] | undefined, private opts: CommandOptions) {}

  async decompose(featureDescription: string, targetStructure: string[]): Promise<ChunkPlan[]> {
    const res = await callCommand(
      this.command,
      'GANTRY_PLANNER_CMD',
      'decompose',
      { featureDescription, targetStructure },
      PlanResponse,
      this.opts
    );
    return res.chunks;
  }
}

export class CommandGenerator implements CodeGenerator {
  constructor(private command: string[] | undefined, private opts: CommandOptions) {}

  async generate(chunk: Chunk, existingFiles: Record<string, string>): Promise<GenerationResult> {
    return callCommand(this.command, 'GANTRY_GENERATOR_CMD', 'generate', { chunk, existingFiles }, GenerateResponse, this.opts);
  }
}

export class CommandIntegrator implements Integrator {
  constructor(private command: string[] | undefined, private opts: CommandOptions) {}

  async openIntegration(chunk: Chunk, files: Record<string, string>, commitMessage: string): Promise<string> {
    const res = await callCommand(
      this.command,
      'GANTRY_INTEGRATOR_CMD',
      'open',
      { chunk, files, commitMessage },
      OpenResponse,
      this.opts
    );
    return res.handle;
  }

  async completeIntegration(handle: string): Promise<boolean> {
    const res = await callCommand(this.command, 'GANTRY_INTEGRATOR_CMD', 'complete', { handle }, CompleteResponse, this.opts);
    return res.merged;
  }
}
