#!/usr/bin/env node
import 'dotenv/config';
import process from 'node:process';
import { createInterface } from 'node:readline/promises';
import { loadConfig, USAGE, type LoadedConfig } from '../chat/config.js';
import { Conversation } from '../chat/conversation.js';
import { ConfigurationError } from '../chat/errors.js';
import { createLogger } from '../chat/logger.js';
import { ChatTransport } from '../chat/provider.js';
import { ChatRepl } from '../chat/repl.js';

function readConfig(): LoadedConfig | null {
  try {
    return loadConfig(process.argv.slice(2), process.env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`Error: ${err.message}\n\n${USAGE}`);
      return null;
    }
    throw err;
  }
}

async function main(): Promise<number> {
  const loaded = readConfig();
  if (!loaded) return 1;
  if (loaded.help) {
    process.stdout.write(USAGE);
    return 0;
  }

  const { config } = loaded;
  const log = createLogger(config.logLevel);
  let transport: ChatTransport;
  try {
    transport = new ChatTransport(config);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      process.stderr.write(`Error: ${err.message}\n`);
      return 1;
    }
    throw err;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  let closed = false;
  rl.on('close', () => {
    closed = true;
  });

  const repl = new ChatRepl({
    conversation: new Conversation(config.systemPrompt),
    transport,
    log,
    stream: config.stream,
    sampling: { maxTokens: config.maxTokens, temperature: config.temperature },
    out: process.stdout,
    prompt: async (label) => {
      if (closed) return null;
      try {
        return await rl.question(label);
      } catch (err) {
        // question() rejects once the interface has been closed (Ctrl-D / Ctrl-C at the prompt).
        if (closed) return null;
        throw err;
      }
    },
  });

  // Ctrl-C cancels a reply in flight; at the prompt it ends the session.
  rl.on('SIGINT', () => {
    if (!repl.abortTurn()) rl.close();
  });

  try {
    return await repl.run();
  } finally {
    rl.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);
