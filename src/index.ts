#!/usr/bin/env node
import * as readline from "readline/promises";
import { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
import { ChatConsole } from "./app/ChatConsole";
import type { ConsoleIO } from "./app/ChatConsole";
import { buildApplication } from "./composition/container";
import { loadConfig } from "./config";
import { loadDotenv, readEnv } from "./env";
import { initializeLogging } from "./runtime/logging";

function createConsoleIO(rl: readline.Interface): ConsoleIO {
  let closed = false;
  const closing = new Promise<null>((resolve) => {
    rl.once("close", () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    ask: async (prompt) => {
      if (closed) return null;
      const answer = rl.question(prompt).catch((err: unknown) => {
        if (closed) return null;
        throw err;
      });
      return Promise.race([answer, closing]);
    },
    write: (line) => console.log(line),
  };
}

async function main() {
  loadDotenv();
  const env = readEnv(process.env, process.argv.slice(2));

  const loggingHandle = initializeLogging(env.logFile);
  if (loggingHandle.logPath) {
    console.log(`Logging output to ${loggingHandle.logPath}`);
  }

  const logger = new ConsoleLogger({ debug: env.debugMode });
  const { config, path } = loadConfig(logger, env.configPath);
  if (path) {
    logger.info(`Loaded config from ${path}`);
  }

  const app = buildApplication({ env, config, logger });
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const chat = new ChatConsole(app.session, createConsoleIO(rl), app.bus, {
    debugTools: env.debugMode,
  });

  // Ctrl+C cancels the turn in flight; at the prompt it quits.
  rl.on("SIGINT", () => {
    if (!chat.cancel()) {
      console.log("\nExiting…");
      rl.close();
    }
  });

  try {
    if (env.examples) {
      const failures = await chat.runExamples();
      process.exitCode = failures ? 1 : 0;
    } else {
      await chat.runInteractive();
    }
  } finally {
    rl.close();
    await loggingHandle.shutdown();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
