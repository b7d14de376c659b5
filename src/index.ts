import { parseCommand, validateEnvironment, type EngineCommand } from "./config/environment";
import { DEFAULT_UNIVERSE } from "./config/universe";
import { Orchestrator } from "./engine/Orchestrator";
import { logger } from "./utils/logger";

async function runManual(orchestrator: Orchestrator, command: EngineCommand): Promise<boolean> {
  if (command.mode === "enter") {
    const result = await orchestrator.enterPosition(command.ticker, command.price, command.notional);
    if (result.status === "vetoed") {
      const decision = result.decision;
      logger.warning(`${command.ticker} entry vetoed${decision.approved ? "" : `: ${decision.reason.message}`}`);
      return false;
    }
    logger.info(`${command.ticker} is ${result.signal.state} with ${result.position.quantity} shares`);
    return true;
  }
  if (command.mode === "close") {
    const result = await orchestrator.closePosition(command.ticker, command.price);
    logger.info(`${command.ticker} outcome recorded: ${result.outcome.win ? "win" : "loss"}`);
    return true;
  }
  return false;
}

async function main(): Promise<void> {
  let command: EngineCommand;
  let orchestrator: Orchestrator;
  try {
    command = parseCommand();
    orchestrator = new Orchestrator(validateEnvironment(), [...DEFAULT_UNIVERSE]);
  } catch (err) {
    logger.error("Invalid configuration", err);
    process.exit(1);
  }

  if (command.mode === "enter" || command.mode === "close") {
    let code = 0;
    try {
      if (!(await runManual(orchestrator, command))) code = 1;
    } catch (err) {
      logger.error(`Manual ${command.mode} failed`, err);
      code = 1;
    }
    await orchestrator.shutdown();
    process.exit(code);
  }

  if (command.mode === "once") {
    // Single refresh, for ad-hoc runs and external schedulers
    let code = 0;
    try {
      const report = await orchestrator.runOnce();
      if (!report || report.failures.length > 0) code = 1;
    } catch (err) {
      logger.error("Refresh failed", err);
      code = 1;
    }
    await orchestrator.shutdown();
    process.exit(code);
  }

  try {
    await orchestrator.start();
    logger.success(`Drawdown reversion engine started for ${DEFAULT_UNIVERSE.length} pairs`);
  } catch (err) {
    logger.error("Failed to start engine", err);
    process.exit(1);
  }

  const stop = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down...`);
    await orchestrator.shutdown();
    process.exit(0);
  };

  process.on("SIGINT", () => void stop("SIGINT"));
  process.on("SIGTERM", () => void stop("SIGTERM"));
}

main().catch((err) => {
  logger.error("Fatal error", err);
  process.exit(1);
});
