import { parseCoordinates } from "./coordinates";
import type { TaggerOptions } from "./types";

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export type CliArgs = { help: true } | { help: false; options: TaggerOptions };

const REQUIRED = ["src", "dest", "logfile"] as const;
const VALUE_FLAGS = [...REQUIRED, "geo", "alt", "tags"] as const;
const BOOLEAN_FLAGS = ["help", "verbose"] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(name: string): name is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === name);
}

/**
 * Splits a comma separated list such as `"school, daycare"` into
 * trimmed entries. An empty string yields no tags.
 */
export function parseTags(text: string): string[] {
  if (text === "") {
    return [];
  }
  return text.split(",").map((tag) => tag.trim());
}

function parseAltitude(text: string): number {
  const altitude = text.trim() === "" ? Number.NaN : Number(text);
  if (!Number.isFinite(altitude)) {
    throw new UsageError(`--alt must be a number, got "${text}"`);
  }
  return altitude;
}

/**
 * Parses command line arguments.
 *
 * Options take their value either inline (`--geo=-45,32`) or as the
 * next argument (`--geo 45,-93`). A value that starts with `--` is never
 * taken as the next argument's value.
 *
 * @param args - Raw arguments from process.argv
 * @returns Either a help request or the complete tagger options
 * @throws UsageError for unknown, duplicate or missing options
 * @throws RangeError if `--geo` is out of range
 */
export function parseArgs(args: string[]): CliArgs {
  // process.argv: [node, script.js, ...userArgs]
  const userArgs = args.slice(2);
  const values = new Map<ValueFlag, string>();
  let help = false;
  let verbose = false;

  for (let i = 0; i < userArgs.length; i++) {
    const arg = userArgs[i];
    if (!arg.startsWith("--")) {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }

    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const inline = eq === -1 ? null : arg.slice(eq + 1);

    if (BOOLEAN_FLAGS.some((flag) => flag === name)) {
      if (inline !== null) {
        throw new UsageError(`--${name} does not take a value`);
      }
      if (name === "help") help = true;
      if (name === "verbose") verbose = true;
      continue;
    }

    if (!isValueFlag(name)) {
      throw new UsageError(`Unknown option: --${name}`);
    }
    if (values.has(name)) {
      throw new UsageError(`--${name} given more than once`);
    }

    let value = inline;
    if (value === null) {
      const next = userArgs[i + 1];
      if (next === undefined || next.startsWith("--")) {
        throw new UsageError(`--${name} requires a value`);
      }
      value = next;
      i++;
    }
    values.set(name, value);
  }

  if (help) {
    return { help: true };
  }

  const missing = REQUIRED.filter((flag) => !values.has(flag));
  if (missing.length > 0) {
    const list = missing.map((flag) => `--${flag}`).join(", ");
    throw new UsageError(`Missing required options: ${list}`);
  }

  const geo = values.get("geo");
  const alt = values.get("alt");
  const tags = values.get("tags");

  return {
    help: false,
    options: {
      src: values.get("src") ?? "",
      dest: values.get("dest") ?? "",
      logfile: values.get("logfile") ?? "",
      geo: geo === undefined ? null : parseCoordinates(geo),
      altitude: alt === undefined ? null : parseAltitude(alt),
      tags: tags === undefined ? null : parseTags(tags),
      verbose,
    },
  };
}
