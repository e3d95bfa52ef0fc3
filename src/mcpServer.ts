import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { config } from "./config";
import { InferenceError, InvalidTaskError, describeError } from "./errors";
import { buildScheduler, openRepositories } from "./index";
import { logger } from "./logger";
import { InferenceClient, InferenceCollaborator } from "./services/inferenceClient";
import type { Scheduler, TaskSnapshot } from "./services/scheduler";
import { buildStrategyRegistry } from "./services/strategies";
import type { FetchJob, ResearchTask } from "./types/research";

export type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

export interface ResearchToolDeps {
  scheduler: Scheduler;
  inference: InferenceCollaborator;
}

export interface CreateTaskArgs {
  query: string;
  target_urls: string[];
  task_timeout_seconds?: number;
}

export interface UpdateTaskArgs {
  task_id: string;
  cancel?: boolean;
  note?: string;
}

const text = (value: string): ToolResult => ({ content: [{ type: "text", text: value }] });
const failure = (message: string): ToolResult => ({ content: [{ type: "text", text: `Error: ${message}` }], isError: true });

function taskLine(task: ResearchTask) {
  return `ID: ${task.id}, Query: ${task.query}, Status: ${task.status}`;
}

function jobLine(job: FetchJob) {
  let line = `- ${job.target_url}: ${job.state}`;
  if (job.citation_id) {
    line += `, citation ${job.citation_id}`;
  }
  if (job.abandon_reason) {
    line += `, ${job.abandon_reason}`;
  }
  return line;
}

function renderSnapshot({ task, jobs }: TaskSnapshot) {
  const lines = [taskLine(task)];
  if (task.summary) {
    lines.push(`Summary: ${task.summary.message}`);
  }
  if (task.warnings.length) {
    lines.push(`Warnings: ${task.warnings.join("; ")}`);
  }
  if (task.notes.length) {
    lines.push(`Notes: ${task.notes.join("; ")}`);
  }
  lines.push("Jobs:", ...jobs.map(jobLine));
  return lines.join("\n");
}

async function guarded(tool: string, run: () => Promise<ToolResult>): Promise<ToolResult> {
  try {
    return await run();
  } catch (error) {
    if (error instanceof InvalidTaskError) {
      return failure(error.message);
    }
    if (error instanceof InferenceError) {
      logger.warn({ error, tool }, "Content analysis unavailable");
      return failure("inference collaborator unavailable");
    }
    logger.error({ error, tool }, "MCP tool failed");
    return failure(describeError(error));
  }
}

/** Tool handlers over the scheduler; kept apart from the transport so they can be called directly. */
export function createResearchTools({ scheduler, inference }: ResearchToolDeps) {
  return {
    createTask: (args: CreateTaskArgs) =>
      guarded("create_research_task", async () => {
        const seconds = args.task_timeout_seconds;
        const task = await scheduler.submit(args.query, args.target_urls, {
          taskTimeoutMs: seconds !== undefined ? seconds * 1000 : undefined,
        });
        const lines = [`Research task ${task.id} accepted. Status: ${task.status}`];
        if (task.warnings.length) {
          lines.push(`Warnings: ${task.warnings.join("; ")}`);
        }
        return text(lines.join("\n"));
      }),

    listTasks: (args: { limit?: number }) =>
      guarded("list_research_tasks", async () => {
        const tasks = await scheduler.listRecent(args.limit ?? 20);
        if (!tasks.length) {
          return text("No research tasks found.");
        }
        return text(["Research tasks:", ...tasks.map(taskLine)].join("\n"));
      }),

    getTask: (args: { task_id: string }) =>
      guarded("get_research_task", async () => {
        const snapshot = await scheduler.getStatus(args.task_id);
        return snapshot ? text(renderSnapshot(snapshot)) : failure(`Task ${args.task_id} not found`);
      }),

    updateTask: (args: UpdateTaskArgs) =>
      guarded("update_research_task", async () => {
        if (!args.cancel && !args.note?.trim()) {
          return failure("cancel or note is required");
        }
        const task = await scheduler.update(args.task_id, { cancel: args.cancel, note: args.note });
        if (!task) {
          return failure(`Task ${args.task_id} not found`);
        }
        return text(
          `Task ${task.id} updated. Status: ${task.status}, cancel requested: ${task.cancel_requested}, notes: ${task.notes.length}`,
        );
      }),

    analyzeContent: (args: { content: string }) =>
      guarded("analyze_content", async () => text(await inference.analyze(args.content))),
  };
}

export function buildMcpServer(deps: ResearchToolDeps): McpServer {
  const tools = createResearchTools(deps);
  const server = new McpServer({ name: "research-fetch", version: "0.1.0" });

  server.tool(
    "create_research_task",
    "Queue a research task: every target URL is fetched, escalating fetch strategies as needed, validated and cited.",
    {
      query: z.string().trim().min(1).describe("The research question the targets should answer"),
      target_urls: z.array(z.string()).min(1).max(200).describe("URLs to fetch for this task"),
      task_timeout_seconds: z.number().positive().max(86400).optional().describe("Deadline for the whole task"),
    },
    (args) => tools.createTask(args),
  );

  server.tool(
    "list_research_tasks",
    "List recent research tasks, newest first.",
    { limit: z.number().int().min(1).max(100).optional().describe("How many tasks to list (default 20)") },
    (args) => tools.listTasks(args),
  );

  server.tool(
    "get_research_task",
    "Show a research task with the state, citation and abandon reason of each target.",
    { task_id: z.string().uuid().describe("The task id returned on creation") },
    (args) => tools.getTask(args),
  );

  server.tool(
    "update_research_task",
    "Request cancellation of a running task and/or attach a note to it.",
    {
      task_id: z.string().uuid().describe("The task to update"),
      cancel: z.boolean().optional().describe("Stop admitting fetch attempts for the task"),
      note: z.string().max(2000).optional().describe("Annotation stored with the task"),
    },
    (args) => tools.updateTask(args),
  );

  server.tool(
    "analyze_content",
    "Summarize content for accuracy, relevance and key points with the local model.",
    { content: z.string().min(1).max(100_000).describe("Content to analyze") },
    (args) => tools.analyzeContent(args),
  );

  return server;
}

async function main() {
  const { repositories, close } = await openRepositories(config);
  const inference = new InferenceClient(config.inference);
  const registry = buildStrategyRegistry({ renderer: config.renderer, proxies: config.fetch.proxies });
  const scheduler = buildScheduler(config, repositories, inference, registry);
  const server = buildMcpServer({ scheduler, inference });

  await scheduler.start();
  await server.connect(new StdioServerTransport());
  logger.info("MCP server listening on stdio");

  const shutdown = async () => {
    await server.close();
    await scheduler.stop();
    await registry.close();
    await close();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal }, "Shutting down");
      shutdown()
        .catch((error: unknown) => {
          logger.error({ error }, "Shutdown failed");
          process.exitCode = 1;
        })
        .finally(() => process.exit());
    });
  }
}

if (require.main === module) {
  main().catch((err) => {
    logger.error({ err }, "Failed to start MCP server");
    process.exit(1);
  });
}
