import { describe, it, expect } from 'vitest';
import { CollaboratorError } from '../src/core/errors.js';
import type { Chunk } from '../src/core/types.js';
import {
  ChunkPlanSchema,
  CommandGenerator,
  CommandIntegrator,
  CommandPlanner
} from '../src/infra/commandCollaborators.js';
import { chunk } from './helpers.js';

const opts = { timeoutMs: 10_000 };

// A node one-liner standing in for a collaborator. `req` is the parsed stdin
// request and `op` the operation argument appended by the caller.
function nodeCommand(body: string): string[] {
  return [
    process.execPath,
    '-e',
    `let input = ''; process.stdin.on('data', (d) => { input += d; }); process.stdin.on('end', () => { const req = JSON.parse(input || 'null'); const op = process.argv[1]; ${body} });`
  ];
}

async function collaboratorError(run: Promise<unknown>): Promise<CollaboratorError> {
  const err: unknown = await run.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!(err instanceof CollaboratorError)) throw new Error(`expected a CollaboratorError, got ${String(err)}`);
  return err;
}

describe('command collaborators', () => {
  it('fails without retry when no command is configured', async () => {
    const err = await collaboratorError(new CommandPlanner(undefined, opts).decompose('Add search', []));
    expect(err.retryable).toBe(false);
    expect(err.message).toBe('No command configured for decompose (set GANTRY_PLANNER_CMD)');
  });

  it('names the integrator variable for merge requests', async () => {
    await expect(new CommandIntegrator([], opts).completeIntegration('pr-1')).rejects.toThrow(
      'No command configured for complete (set GANTRY_INTEGRATOR_CMD)'
    );
  });

  it('sends the request on stdin and parses the printed plan', async () => {
    const planner = new CommandPlanner(
      nodeCommand(
        `process.stdout.write(JSON.stringify({ chunks: [{ id: op, description: req.featureDescription, files: req.targetStructure }] }));`
      ),
      opts
    );

    const plans = await planner.decompose('Add search', ['src/search.ts']);
    expect(plans).toEqual([{ id: 'decompose', description: 'Add search', files: ['src/search.ts'], dependencies: [] }]);
  });

  it('passes the generated files through', async () => {
    const generator = new CommandGenerator(
      nodeCommand(
        `process.stdout.write(JSON.stringify({ files: { [req.chunk.files[0]]: 'export {};\\n' }, commitMessage: 'Add ' + req.chunk.id }));`
      ),
      opts
    );
    const target: Chunk = chunk('t1_api', { files: ['src/api.ts'] });

    const result = await generator.generate(target, {});
    expect(result).toEqual({ files: { 'src/api.ts': 'export {};\n' }, commitMessage: 'Add t1_api' });
  });

  it('stringifies numeric integration handles and reads the merge flag', async () => {
    const integrator = new CommandIntegrator(
      nodeCommand(
        `process.stdout.write(JSON.stringify(op === 'open' ? { handle: 42 } : { merged: req.handle === '42' }));`
      ),
      opts
    );

    expect(await integrator.openIntegration(chunk('t1_api'), {}, 'Add api')).toBe('42');
    expect(await integrator.completeIntegration('42')).toBe(true);
    expect(await integrator.completeIntegration('7')).toBe(false);
  });

  it('honours a reported non-retryable failure', async () => {
    const planner = new CommandPlanner(
      nodeCommand(`process.stdout.write(JSON.stringify({ error: 'feature is out of scope', retryable: false })); process.exitCode = 2;`),
      opts
    );

    const err = await collaboratorError(planner.decompose('Add search', []));
    expect(err.message).toBe('feature is out of scope');
    expect(err.retryable).toBe(false);
  });

  it('treats a crash as retryable and reports stderr', async () => {
    const planner = new CommandPlanner(nodeCommand(`console.error('planner crashed'); process.exitCode = 1;`), opts);

    const err = await collaboratorError(planner.decompose('Add search', []));
    expect(err.message).toBe('decompose failed: planner crashed');
    expect(err.retryable).toBe(true);
  });

  it('treats output that is not the expected JSON as retryable', async () => {
    const planner = new CommandPlanner(nodeCommand(`process.stdout.write('not json');`), opts);

    const err = await collaboratorError(planner.decompose('Add search', []));
    expect(err.message).toMatch(/^decompose returned an invalid response: /);
    expect(err.retryable).toBe(true);
  });

  it('times out a command that never answers', async () => {
    const planner = new CommandPlanner(
      [process.execPath, '-e', 'process.stdin.resume(); setInterval(() => {}, 1000);'],
      { timeoutMs: 300 }
    );

    const err = await collaboratorError(planner.decompose('Add search', []));
    expect(err.message).toBe('decompose timed out after 300ms');
    expect(err.retryable).toBe(true);
  });

  it('defaults plan dependencies to none', () => {
    const parsed = ChunkPlanSchema.parse({ id: 'api', description: 'API layer', files: ['src/api.ts'] });
    expect(parsed).toEqual({ id: 'api', description: 'API layer', files: ['src/api.ts'], dependencies: [] });
  });

  it('rejects plans with an out-of-range effort', () => {
    const parsed = ChunkPlanSchema.safeParse({ id: 'api', description: 'API', files: ['a.ts'], estimatedEffort: 11 });
    expect(parsed.success).toBe(false);
  });
});
