#!/usr/bin/env node

import process from "node:process";

import { simpleGit } from "simple-git";

import { AzureDevOpsGateway } from "./azure.js";
import { type CliCommand, parseCommand, redactCommand } from "./cli.js";
import { type AppConfig, loadConfig, redactConfig } from "./config.js";
import { describeError } from "./errors.js";
import { collectDiff, inferRepositoryId, pushBranch } from "./git.js";
import { createLogger, setLogger } from "./logging.js";
import { createTextGenerator } from "./providers.js";
import { formatElapsed } from "./utils.js";
import { runWorkflow } from "./workflow.js";

async function main(): Promise<void> {
  let invocation: { command: CliCommand; config: AppConfig };
  try {
    const command = parseCommand();
    if (!command) {
      return;
    }
    invocation = { command, config: loadConfig(command, process.env) };
  } catch (error) {
    console.error("[ERROR]", describeError(error));
    process.exitCode = 1;
    return;
  }
  const { command, config } = invocation;

  const logger = createLogger(config.debug);
  setLogger(logger);

  if (config.debug) {
    logger.debug("CLI command:", JSON.stringify(redactCommand(command), null, 2));
    logger.debug("Configuration:", JSON.stringify(redactConfig(config), null, 2));
  }

  const git = simpleGit();
  const startTime = Date.now();

  try {
    const result = await runWorkflow(config, {
      collectDiff: (sourceBranch, targetBranch) =>
        collectDiff(git, sourceBranch, targetBranch, { ignoreFiles: config.ignoreFiles }),
      createGenerator: (spec) => createTextGenerator(spec),
      createGateway: (context) => new AzureDevOpsGateway(context),
      pushBranch: (branch) => pushBranch(git, branch),
      inferRepositoryId: () => inferRepositoryId(git),
      print: (text) => console.log(text),
    });

    const elapsed = formatElapsed(Date.now() - startTime);
    if (result.exitCode === 0) {
      logger.info(`${result.mode} completed in ${elapsed}.`);
    } else {
      logger.info(`${result.mode} stopped after ${elapsed} (${result.states.join(" -> ")}).`);
    }
    process.exitCode = result.exitCode;
  } catch (error) {
    logger.error(`${config.mode} failed:`, describeError(error));
    process.exitCode = 1;
  }
}

void main();
