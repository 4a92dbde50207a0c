#!/usr/bin/env node
import { createApprovalGate } from "./approval.js";
import { createBackend, type LlmBackend, pingBackend } from "./backend.js";
import { loadLatestCheckpoint } from "./checkpoint.js";
import { buildConfig, type CrewConfig, HELP_TEXT, parseCliArgs, readVersion } from "./config.js";
import { assembleCrew, type CrewPlan, loadCrewPlan, loadPingTarget } from "./crew-builder.js";
import { Logger } from "./logger.js";
import { msg } from "./messages.js";
import { formatStats, loadStats, recordRunStart } from "./stats.js";
import { preview } from "./utils.js";

function printPlan(plan: CrewPlan, logger: Logger): void {
  logger.info(msg.crewSource(plan.crewSource));
  logger.info(msg.validateHeader(plan.crewFile.process, plan.crewFile.maxRevisions));
  plan.tasks.forEach(({ entry, record, llm }, i) => {
    logger.info(msg.validateTask(i + 1, entry.id, record.id, llm.model));
    logger.info(msg.validateDetail("role", record.role));
    if (entry.dependsOn.length > 0) logger.info(msg.validateDetail("depends on", entry.dependsOn.join(", ")));
    if (record.tools.length > 0) logger.info(msg.validateDetail("tools", record.tools.join(", ")));
    if (record.outputFile) logger.info(msg.validateDetail("output", record.outputFile));
    if (entry.humanApproval) logger.info(msg.validateDetail("approval", "human"));
    logger.debug(msg.agentSource(record.id, record.source));
  });
}

async function runCrew(config: CrewConfig, logger: Logger, backend: LlmBackend): Promise<boolean> {
  const plan = await loadCrewPlan(config);
  logger.info(msg.crewSource(plan.crewSource));
  logger.debug(msg.configLoaded(backend.name, plan.crewFile.llm.model, config.verbose));

  let runConfig = config;
  const checkpoint = config.resume ? await loadLatestCheckpoint(config) : null;
  if (config.resume && !checkpoint) logger.warn(msg.noCheckpoint);
  if (checkpoint) {
    // Continue in the interrupted run's directory so its artifacts stay together.
    runConfig = { ...config, runId: checkpoint.runId };
    logger.info(msg.resuming(checkpoint.runId, checkpoint.completed.length));
  }

  await recordRunStart(config);

  const gate = createApprovalGate(config.autoApprove, logger);
  try {
    const crew = assembleCrew(plan, runConfig, { backend, gate, logger, restored: checkpoint?.completed });
    const result = await crew.kickoff();
    if (result.status === "failed") {
      logger.error(msg.fatal(result.error?.message ?? "run failed"));
      return false;
    }
    if (result.finalOutput) logger.debug(preview(result.finalOutput));
    return true;
  } finally {
    gate.close();
  }
}

// Graceful shutdown: stop the backend on Ctrl+C or kill
let activeShutdown: (() => Promise<void>) | null = null;

function handleSignal(signal: NodeJS.Signals) {
  const code = signal === "SIGINT" ? 130 : 143;
  if (activeShutdown) {
    const fn = activeShutdown;
    activeShutdown = null;
    void fn().finally(() => process.exit(code));
  } else {
    process.exit(code);
  }
}

async function main(config: CrewConfig): Promise<boolean> {
  const logger = new Logger(config.verbose, config.runId);

  switch (config.command) {
    case "stats": {
      console.log(formatStats(await loadStats(config)));
      return true;
    }
    case "validate": {
      printPlan(await loadCrewPlan(config), logger);
      logger.info(msg.validateOk);
      return true;
    }
    case "ping": {
      const { crewSource, llm } = loadPingTarget(config);
      logger.info(msg.crewSource(crewSource));
      const backend = await createBackend(config, logger);
      await backend.start();
      try {
        logger.info(msg.pingStart(backend.name, llm.model));
        logger.info(msg.pingSuccess(preview(await pingBackend(backend, llm))));
        return true;
      } finally {
        await backend.stop();
      }
    }
    case "run": {
      const backend = await createBackend(config, logger);
      activeShutdown = () => backend.stop();
      await backend.start();
      try {
        const ok = await runCrew(config, logger, backend);
        if (!ok && logger.logFilePath) console.error(msg.logFileHint(logger.logFilePath));
        return ok;
      } finally {
        activeShutdown = null;
        await backend.stop();
      }
    }
  }
}

process.on("SIGINT", () => handleSignal("SIGINT"));
process.on("SIGTERM", () => handleSignal("SIGTERM"));

try {
  const cli = parseCliArgs(process.argv.slice(2));
  if (cli.help) {
    console.log(HELP_TEXT);
  } else if (cli.version) {
    console.log(readVersion());
  } else if (!(await main(buildConfig(cli, process.env)))) {
    process.exitCode = 1;
  }
} catch (err) {
  console.error(msg.fatal(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
}
