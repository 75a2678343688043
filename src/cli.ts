#!/usr/bin/env node
import { createInterface } from 'readline';
import { parseArgs } from 'util';

import { createRuntime, type RuntimeOptions } from './activation/createRuntime';
import { AUTO_DETECT, describeLanguage, findLanguage } from './constants/languages';
import type { TaskId } from './types/translation';
import { ConfigurationError } from './utils/config';

const USAGE = `Usage: translate-cli [--from <code>] [--to <code>] [--no-debounce]

Reads text from stdin, one request per line, and prints each translation.

Options:
  --from <code>       Source language code, or "auto" (default: auto)
  --to <code>         Target language code (default: en)
  --no-debounce       Dispatch every line immediately
  --shutdown-ms <ms>  Milliseconds to wait for in-flight calls on exit (default: 5000)
  -h, --help          Show this message`;

export interface CliIo {
  argv: string[];
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
}

export async function main(
  io: CliIo = { argv: process.argv.slice(2), stdin: process.stdin, stdout: process.stdout, stderr: process.stderr },
  runtimeOptions: RuntimeOptions = {},
): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;

  try {
    args = parseCliArgs(io.argv);
  } catch (error) {
    io.stderr.write(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}\n`);
    return 2;
  }

  if (args.help) {
    io.stdout.write(`${USAGE}\n`);
    return 0;
  }

  let runtime: ReturnType<typeof createRuntime>;

  try {
    runtime = createRuntime({ logStream: io.stderr, ...runtimeOptions });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      io.stderr.write(`${error.message}\n`);
      return 2;
    }

    throw error;
  }

  const { orchestrator, configuration } = runtime;
  let lastTaskId: TaskId | undefined;
  let lastOutcome: 'succeeded' | 'failed' | 'cancelled' | undefined;
  let settleLast: (() => void) | undefined;

  orchestrator.on('complete', ({ text, detectedLanguage }) => {
    if (args.from === AUTO_DETECT) {
      io.stderr.write(`Detected language: ${describeLanguage(detectedLanguage)}\n`);
    }

    io.stdout.write(`${text}\n`);
  });

  orchestrator.on('error', ({ error }) => {
    io.stderr.write(`Translation failed (${error.kind}): ${error.message}\n`);
    io.stderr.write(`  Cause: ${error.cause}\n  Solution: ${error.solution}\n`);
  });

  orchestrator.on('retrying', ({ attempt, maxAttempts, delayMs }) => {
    io.stderr.write(`Retrying in ${delayMs}ms (attempt ${attempt}/${maxAttempts} failed)...\n`);
  });

  if (configuration.verboseLogging) {
    orchestrator.on('progress', ({ percentage, message }) => {
      io.stderr.write(`[${percentage}%] ${message}\n`);
    });
  }

  orchestrator.on('finished', ({ taskId, state }) => {
    if (taskId !== lastTaskId) {
      return;
    }

    lastOutcome = state;
    settleLast?.();
  });

  const lines = createInterface({ input: io.stdin, crlfDelay: Infinity });

  for await (const line of lines) {
    if (line.trim().length === 0) {
      continue;
    }

    lastOutcome = undefined;
    lastTaskId = orchestrator.submit(line, args.from, args.to, args.debounce);
  }

  if (lastTaskId && lastOutcome === undefined) {
    await new Promise<void>((resolve) => {
      settleLast = resolve;
    });
  }

  await orchestrator.shutdown(args.shutdownMs);
  runtime.dispose();

  return lastOutcome === 'failed' ? 1 : 0;
}

function parseCliArgs(argv: string[]) {
  const { values } = parseArgs({
    args: argv,
    options: {
      from: { type: 'string', default: AUTO_DETECT },
      to: { type: 'string', default: 'en' },
      'no-debounce': { type: 'boolean', default: false },
      'shutdown-ms': { type: 'string', default: '5000' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: false,
  });

  const from = values.from ?? AUTO_DETECT;
  const to = values.to ?? 'en';

  for (const code of [from, to]) {
    if (!findLanguage(code)) {
      throw new Error(`Unsupported language code: ${code}`);
    }
  }

  const shutdownMs = Number(values['shutdown-ms']);

  if (!Number.isInteger(shutdownMs) || shutdownMs < 0) {
    throw new Error(`Invalid --shutdown-ms value: ${values['shutdown-ms'] ?? ''}`);
  }

  return {
    from: from.trim().toLowerCase(),
    to: to.trim().toLowerCase(),
    debounce: !values['no-debounce'],
    shutdownMs,
    help: values.help ?? false,
  };
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
