#!/usr/bin/env node
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema
} from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { loadConfig } from './core/config.js';
import { createLogger } from './core/logger.js';
import { openDb } from './infra/db.js';
import { createGantry } from './core/gantry.js';
import { errorMessage } from './core/errors.js';
import { EventTypeSchema } from './core/events.js';
import { CHUNK_STATUSES, TASK_STATUSES } from './core/types.js';
import { CommandGenerator, CommandIntegrator, CommandPlanner } from './infra/commandCollaborators.js';
import { FsWorkspace } from './infra/workspace.js';

// This process only reads and writes the shared store; the HTTP server runs
// the orchestrator and picks submitted tasks up from the queue.
const cfg = loadConfig(process.env);
const log = createLogger({ ...cfg, GANTRY_LOG_LEVEL: 'silent' });
const db = openDb(cfg);
const collaboratorOpts = { timeoutMs: cfg.GANTRY_COLLABORATOR_TIMEOUT_MS };
const gantry = createGantry(db, log, cfg, {
  planner: new CommandPlanner(cfg.GANTRY_PLANNER_CMD, collaboratorOpts),
  generator: new CommandGenerator(cfg.GANTRY_GENERATOR_CMD, collaboratorOpts),
  integrator: new CommandIntegrator(cfg.GANTRY_INTEGRATOR_CMD, collaboratorOpts),
  workspace: new FsWorkspace()
});

const server = new Server(
  {
    name: 'gantry',
    version: '0.1.0'
  },
  {
    capabilities: {
      tools: {},
      resources: {}
    }
  }
);

// Tool input schemas
const TaskSubmitInput = z.object({
  targetPath: z.string().min(1).describe('Directory the feature is implemented in'),
  featureDescription: z.string().min(1).max(20000).describe('What the feature should do')
});

const TaskGetInput = z.object({
  taskId: z.string().min(4).describe('Task ID')
});

const TaskListInput = z.object({
  status: z.enum(TASK_STATUSES).optional().describe('Only tasks in this status'),
  limit: z.number().int().min(1).max(200).default(50).optional().describe('Max tasks to return')
});

const ChunksListInput = z.object({
  taskId: z.string().optional().describe('Only chunks of this task'),
  status: z.enum(CHUNK_STATUSES).optional().describe('Only chunks in this status')
});

const LocksListInput = z.object({
  actor: z.string().optional().describe('Only locks held by this actor')
});

const OverlapCheckInput = z.object({
  files: z.array(z.string().min(1)).min(1).max(200).describe('Files to check for locks')
});

const EventsQueryInput = z.object({
  type: EventTypeSchema.optional().describe('Event type'),
  actor: z.string().optional().describe('Originating actor'),
  limit: z.number().int().min(1).max(500).default(50).optional().describe('Max events')
});

function text(value: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: typeof value === 'string' ? value : JSON.stringify(value, null, 2) }],
    ...(isError ? { isError: true } : {})
  };
}

// List available tools
server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: 'gantry_status',
        description: 'Get Gantry status: queued and active tasks, chunk and lock counts.',
        inputSchema: { type: 'object', properties: {}, required: [] }
      },
      {
        name: 'gantry_task_submit',
        description:
          'Queue a feature for implementation. The orchestrator picks queued tasks up strictly in submission order, one at a time.',
        inputSchema: {
          type: 'object',
          properties: {
            targetPath: { type: 'string', description: 'Directory the feature is implemented in' },
            featureDescription: { type: 'string', description: 'What the feature should do' }
          },
          required: ['targetPath', 'featureDescription']
        }
      },
      {
        name: 'gantry_task_get',
        description: 'Get a task summary: status, current phase, progress percentage and every chunk.',
        inputSchema: {
          type: 'object',
          properties: { taskId: { type: 'string', description: 'Task ID' } },
          required: ['taskId']
        }
      },
      {
        name: 'gantry_task_list',
        description: 'List tasks, oldest first.',
        inputSchema: {
          type: 'object',
          properties: {
            status: { type: 'string', enum: [...TASK_STATUSES], description: 'Only tasks in this status' },
            limit: { type: 'number', description: 'Max tasks to return (1-200, default 50)' }
          },
          required: []
        }
      },
      {
        name: 'gantry_task_cancel',
        description:
          'Cancel a task that has not finished. Work already running is not interrupted, but nothing more is scheduled.',
        inputSchema: {
          type: 'object',
          properties: { taskId: { type: 'string', description: 'Task ID' } },
          required: ['taskId']
        }
      },
      {
        name: 'gantry_chunks_list',
        description: 'List chunks with their status, files, dependencies and integration handle.',
        inputSchema: {
          type: 'object',
          properties: {
            taskId: { type: 'string', description: 'Only chunks of this task' },
            status: { type: 'string', enum: [...CHUNK_STATUSES], description: 'Only chunks in this status' }
          },
          required: []
        }
      },
      {
        name: 'gantry_locks_list',
        description: 'List file locks currently held.',
        inputSchema: {
          type: 'object',
          properties: { actor: { type: 'string', description: 'Only locks held by this actor' } },
          required: []
        }
      },
      {
        name: 'gantry_overlap_check',
        description: 'Check which of the given files are locked, and by which chunk.',
        inputSchema: {
          type: 'object',
          properties: {
            files: { type: 'array', items: { type: 'string' }, description: 'Files to check' }
          },
          required: ['files']
        }
      },
      {
        name: 'gantry_events_query',
        description: 'Query the coordination event log, newest first.',
        inputSchema: {
          type: 'object',
          properties: {
            type: { type: 'string', description: 'Event type, e.g. chunk.assigned' },
            actor: { type: 'string', description: 'Originating actor' },
            limit: { type: 'number', description: 'Max events (1-500, default 50)' }
          },
          required: []
        }
      }
    ]
  };
});

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const { name, arguments: args } = request.params;

  try {
    switch (name) {
      case 'gantry_status': {
        return text({
          ...gantry.tasks.counts(),
          queued: gantry.tasks.list({ status: 'queued' }).length,
          ...gantry.store.counts(),
          now: Date.now()
        });
      }

      case 'gantry_task_submit': {
        const input = TaskSubmitInput.parse(args);
        const task = gantry.orchestrator.submit(input.targetPath, input.featureDescription);
        return text(task);
      }

      case 'gantry_task_get': {
        const input = TaskGetInput.parse(args);
        const summary = gantry.progress.getSummary(input.taskId);
        if (!summary) return text(`Task not found: ${input.taskId}`, true);
        return text(summary);
      }

      case 'gantry_task_list': {
        const input = TaskListInput.parse(args ?? {});
        return text(gantry.tasks.list({ status: input.status, limit: input.limit ?? 50 }));
      }

      case 'gantry_task_cancel': {
        const input = TaskGetInput.parse(args);
        const task = gantry.tasks.get(input.taskId);
        if (!task) return text(`Task not found: ${input.taskId}`, true);
        if (!gantry.orchestrator.cancel(input.taskId)) {
          return text({ status: 'rejected', reason: 'TERMINAL', message: `Task is already ${task.status}` }, true);
        }
        return text({ status: 'cancelled', task: gantry.tasks.get(input.taskId) });
      }

      case 'gantry_chunks_list': {
        const input = ChunksListInput.parse(args ?? {});
        return text(gantry.store.listChunks(input));
      }

      case 'gantry_locks_list': {
        const input = LocksListInput.parse(args ?? {});
        return text(gantry.store.listLocks(input.actor));
      }

      case 'gantry_overlap_check': {
        const input = OverlapCheckInput.parse(args);
        const holders = gantry.store.holdersOf(input.files);
        return text({ hasOverlaps: holders.length > 0, overlaps: holders, checkedFiles: input.files });
      }

      case 'gantry_events_query': {
        const input = EventsQueryInput.parse(args ?? {});
        const events = gantry.events.query({ type: input.type, actor: input.actor, limit: input.limit ?? 50 });
        return text({ count: events.length, events });
      }

      default:
        return text(`Unknown tool: ${name}`, true);
    }
  } catch (err) {
    return text(`Error: ${errorMessage(err)}`, true);
  }
});

// Resources: the coordination rules and a live status document
server.setRequestHandler(ListResourcesRequestSchema, async () => {
  return {
    resources: [
      {
        uri: 'gantry://protocol',
        name: 'Gantry Protocol',
        description: 'How chunks are scheduled, locked and merged',
        mimeType: 'text/markdown'
      },
      {
        uri: 'gantry://status',
        name: 'Gantry Status',
        description: 'Current task, chunk and lock counts',
        mimeType: 'application/json'
      }
    ]
  };
});

server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
  const { uri } = request.params;

  if (uri === 'gantry://protocol') {
    return {
      contents: [
        {
          uri,
          mimeType: 'text/markdown',
          text: `# Gantry Protocol

### 1) One task at a time
Tasks run strictly in submission order. A task is analyzed, split into
chunks, and then its chunks are scheduled until every one is merged.

### 2) A chunk starts only when it is free
A planned chunk is available when every chunk it depends on is complete
or merged and none of its files is locked.

### 3) Locks are all or nothing
All of a chunk's files are locked in one transaction. Any overlap with a
held lock means the chunk waits for a later poll. Overlaps are never merged.

### 4) Merges follow dependencies
A complete chunk is merged only after every chunk it depends on is merged.

### 5) Failures are retried
A failed chunk goes back to planned. After the retry budget is spent the
whole task fails with the chunk's error.

## Workflow
1. \`gantry_task_submit\` - Queue a feature
2. \`gantry_task_get\` - Follow its phase and progress
3. \`gantry_chunks_list\` / \`gantry_locks_list\` - Inspect scheduling
4. \`gantry_task_cancel\` - Stop scheduling further work`
        }
      ]
    };
  }

  if (uri === 'gantry://status') {
    return {
      contents: [
        {
          uri,
          mimeType: 'application/json',
          text: JSON.stringify({ ...gantry.tasks.counts(), ...gantry.store.counts() }, null, 2)
        }
      ]
    };
  }

  throw new Error(`Unknown resource: ${uri}`);
});

// Start server
async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((err) => {
  console.error('Gantry MCP server error:', err);
  process.exit(1);
});
