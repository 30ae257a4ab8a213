import type { ParserOptions } from "../options.js";

export const USAGE =
  "Usage: json-pull <input.json> [--max-depth N] [--initial-buffer BYTES] [--max-buffer BYTES] " +
  "or json-pull --input <input.json> [...]";

type SizeOption = "maxDepth" | "initialBufferCapacity" | "maxBufferCapacity";

const SIZE_FLAGS = new Map<string, SizeOption>([
  ["--max-depth", "maxDepth"],
  ["--initial-buffer", "initialBufferCapacity"],
  ["--max-buffer", "maxBufferCapacity"],
]);

export type CliArgs = {
  inputPath: string;
  options: ParserOptions;
};

/**
 * Reads the command line. `--input` wins over a positional path. Throws
 * with a message for the user on anything it cannot use.
 */
export const parseArgs = (args: readonly string[]): CliArgs => {
  const options: ParserOptions = {};
  const positional: string[] = [];
  let inputFlag: string | undefined;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`${arg} expects a value`);
    }
    i += 1;

    if (arg === "--input") {
      inputFlag = value;
      continue;
    }
    const option = SIZE_FLAGS.get(arg);
    if (option === undefined) {
      throw new Error(`Unknown flag ${arg}`);
    }
    const parsed = Number(value);
    if (!Number.isSafeInteger(parsed) || parsed < 1) {
      throw new Error(`${arg} expects a positive integer, got "${value}"`);
    }
    options[option] = parsed;
  }

  const inputPath = inputFlag ?? positional[0];
  if (inputPath === undefined) {
    throw new Error(USAGE);
  }
  return { inputPath, options };
};
