#!/usr/bin/env node

/**
 * Cadence - CLI
 */

import { Command } from "commander";
import { addTask, isTaskStatus, isTaskType, listTasks, loadBacklog, summarizeBacklog, updateTaskStatus } from "./backlog.js";
import { getProjectRoot, loadConfig } from "./config.js";
import { createControllerContext, type ControllerContext } from "./context.js";
import { SprintController } from "./controller.js";
import { ConsoleLogger, FileLogger, TeeLogger, type Logger } from "./logger.js";
import { closeDb, formatMetrics, initDb } from "./metrics.js";
import { initializeProject } from "./project.js";
import { formatStatus, gatherStatus } from "./status.js";
import { StateStore } from "./state.js";
import { EXIT_CODES, TASK_STATUSES, TASK_TYPES, type Config, type TaskStatus, type TaskType } from "./types.js";
import { getVersionString } from "./version.js";

interface RunOptions {
  calls?: number;
  model?: string;
  verbose?: boolean;
}

interface StatusOptions {
  checkDone?: boolean;
}

interface ListOptions {
  status?: TaskStatus;
  sprint?: number;
}

interface AddOptions {
  description?: string;
  type?: TaskType;
  priority?: number;
  points?: number;
  criteria?: string[];
}

interface SetStatusOptions {
  reason?: string;
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(EXIT_CODES.error);
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// === Option parsers ===

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    fail(`Expected a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseTaskStatus(value: string): TaskStatus {
  if (!isTaskStatus(value)) {
    fail(`Unknown status "${value}". Expected one of: ${TASK_STATUSES.join(", ")}`);
  }
  return value;
}

function parseTaskType(value: string): TaskType {
  if (!isTaskType(value)) {
    fail(`Unknown type "${value}". Expected one of: ${TASK_TYPES.join(", ")}`);
  }
  return value;
}

/**
 * Context for the read-only commands: never talks to an agent
 */
function inspectProject(logger: Logger): ControllerContext {
  const config = loadConfig();
  return createControllerContext(config, getProjectRoot(), {
    logger,
    runner: { run: () => Promise.reject(new Error("No agent in inspection mode")), abort: () => {} },
  });
}

function backlogPath(): string {
  return new StateStore(getProjectRoot()).backlogPath;
}

const program = new Command();

program
  .name("cadence")
  .description("Cadence - autonomous sprint controller for AI coding agents")
  .version(getVersionString());

program
  .command("init")
  .description("Initialize a Cadence project in the current directory")
  .argument("<name>", "Project name")
  .action((name: string) => {
    try {
      console.log(`🌱 Initializing Cadence project "${name}"\n`);
      const { created } = initializeProject(process.cwd(), name);
      for (const path of created) {
        console.log(`  Created ${path}`);
      }
      console.log("");
      console.log("Next steps:");
      console.log("  1. Describe the project in specs/ or PRD.md");
      console.log("  2. Adjust prompts/ and .cadence/config.json");
      console.log("  3. Run `cadence run`");
    } catch (err) {
      fail(errorMessage(err));
    }
  });

program
  .command("run")
  .description("Run sprints until the project completes or a guard stops it")
  .option("-c, --calls <n>", "Max agent calls per hour", parsePositiveInt)
  .option("-m, --model <model>", "Agent model override")
  .option("-v, --verbose", "Debug logging")
  .action(async (options: RunOptions) => {
    if (options.verbose) {
      process.env.CADENCE_DEBUG = "1";
    }

    let config: Config;
    let projectRoot: string;
    try {
      config = loadConfig();
      projectRoot = getProjectRoot();
    } catch (err) {
      fail(errorMessage(err));
    }

    if (options.calls !== undefined) config.rateLimiting.maxCallsPerHour = options.calls;
    if (options.model) config.agent.model = options.model;

    const store = new StateStore(projectRoot);
    const logger = new TeeLogger(new ConsoleLogger(options.verbose), new FileLogger(store.logFilePath, options.verbose));

    initDb(store.metricsDbPath);
    const ctx = createControllerContext(config, projectRoot, { logger });
    const controller = new SprintController(ctx);

    // Ctrl+C or kill: record the interruption and release the lock
    const handleShutdown = () => {
      logger.warn("\n🛑 Interrupted, shutting down...");
      controller.report("interrupted", "interrupted");
      ctx.runner.abort();
      ctx.store.releaseLock();
      closeDb();
      process.exit(EXIT_CODES.success);
    };

    process.on("SIGINT", handleShutdown);
    process.on("SIGTERM", handleShutdown);

    try {
      const result = await controller.run();
      closeDb();
      process.exit(result.exitCode);
    } catch (err) {
      logger.error(`❌ Controller failed: ${errorMessage(err)}`);
      controller.report("failed", "error");
      closeDb();
      process.exit(EXIT_CODES.error);
    }
  });

program
  .command("status")
  .description("Show sprint, circuit breaker, rate limit and completion state")
  .option("--check-done", "Exit with 20 when the project is complete")
  .action((options: StatusOptions) => {
    try {
      const ctx = inspectProject(new ConsoleLogger());
      const data = gatherStatus(ctx);
      console.log(formatStatus(data));
      if (options.checkDone && (data.sprint.projectDone || data.completion.projectComplete)) {
        process.exit(EXIT_CODES.projectComplete);
      }
    } catch (err) {
      fail(errorMessage(err));
    }
  });

program
  .command("reset-circuit")
  .description("Close the circuit breaker after investigating why it opened")
  .argument("[reason]", "Reason recorded in the transition history", "Manual reset")
  .action((reason: string) => {
    try {
      inspectProject(new ConsoleLogger()).circuitBreaker.reset(reason);
    } catch (err) {
      fail(errorMessage(err));
    }
  });

program
  .command("reset-rate-limit")
  .description("Zero the hourly call counter")
  .action(() => {
    try {
      inspectProject(new ConsoleLogger()).rateLimiter.reset();
    } catch (err) {
      fail(errorMessage(err));
    }
  });

// === Backlog ===

const backlog = program.command("backlog").description("Inspect and edit backlog.json");

backlog
  .command("list")
  .description("List tasks")
  .option("-s, --status <status>", "Only tasks with this status", parseTaskStatus)
  .option("--sprint <n>", "Only tasks assigned to this sprint", parsePositiveInt)
  .action((options: ListOptions) => {
    try {
      const current = loadBacklog(backlogPath());
      if (!current) {
        console.log("No backlog yet.");
        return;
      }
      const tasks = listTasks(current, { status: options.status, sprint: options.sprint });
      if (tasks.length === 0) {
        console.log("No matching tasks.");
        return;
      }
      for (const task of tasks) {
        const sprint = task.sprint_id === null ? "-" : String(task.sprint_id);
        console.log(
          `${task.id}  ${task.status.padEnd(14)} P${task.priority}  ${task.story_points}pt  sprint ${sprint}  ${task.title}`
        );
        if (task.failure_reason) {
          console.log(`         ↳ ${task.failure_reason}`);
        }
      }
    } catch (err) {
      fail(errorMessage(err));
    }
  });

backlog
  .command("add")
  .description("Add a task to the backlog")
  .argument("<title>", "Task title")
  .option("-d, --description <text>", "Task description")
  .option("-t, --type <type>", `Task type (${TASK_TYPES.join(", ")})`, parseTaskType)
  .option("-p, --priority <n>", "Priority, 1 is highest", parsePositiveInt)
  .option("--points <n>", "Story points", parsePositiveInt)
  .option("--criteria <criteria...>", "Acceptance criteria")
  .action((title: string, options: AddOptions) => {
    try {
      const task = addTask(backlogPath(), {
        title,
        description: options.description,
        type: options.type,
        priority: options.priority,
        storyPoints: options.points,
        acceptanceCriteria: options.criteria,
      });
      console.log(`✅ Added ${task.id}: ${task.title}`);
    } catch (err) {
      fail(errorMessage(err));
    }
  });

backlog
  .command("set-status")
  .description("Move a task to a new status")
  .argument("<id>", "Task ID, e.g. TASK-001")
  .argument("<status>", `New status (${TASK_STATUSES.join(", ")})`, parseTaskStatus)
  .option("-r, --reason <text>", "Failure reason, kept while the task is qa_failed")
  .action((id: string, status: TaskStatus, options: SetStatusOptions) => {
    try {
      const task = updateTaskStatus(backlogPath(), id, status, options.reason);
      console.log(`✅ ${task.id} → ${task.status}`);
    } catch (err) {
      fail(errorMessage(err));
    }
  });

backlog
  .command("summary")
  .description("Task counts by status and story points")
  .action(() => {
    try {
      const current = loadBacklog(backlogPath());
      if (!current) {
        console.log("No backlog yet.");
        return;
      }
      const summary = summarizeBacklog(current);
      console.log(`📋 ${summary.total} tasks, ${summary.donePoints}/${summary.totalPoints} points done`);
      for (const status of TASK_STATUSES) {
        if (summary.byStatus[status] > 0) {
          console.log(`  ${status.padEnd(16)} ${summary.byStatus[status]}`);
        }
      }
      if (summary.unreadable > 0) {
        console.log(`⚠️  ${summary.unreadable} unreadable item(s) in backlog.json`);
      }
    } catch (err) {
      fail(errorMessage(err));
    }
  });

program
  .command("metrics")
  .description("Show invocation and sprint metrics")
  .action(() => {
    try {
      initDb(new StateStore(getProjectRoot()).metricsDbPath);
      console.log(formatMetrics());
      closeDb();
    } catch (err) {
      fail(errorMessage(err));
    }
  });

program.parse();
