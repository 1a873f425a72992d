import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { parseIsoTimestamp } from "./timestamp";
import type {
  CaptureTime,
  ImageMetadataRequest,
  LogRecord,
  TaggerOptions,
  TaggerResult,
} from "./types";
import { tagImage } from "./writer";

export class PathNotFoundError extends Error {
  constructor(
    readonly kind: string,
    readonly path: string,
  ) {
    super(`${kind} "${path}" not found`);
    this.name = "PathNotFoundError";
  }
}

/**
 * Parses one line of the JSON log.
 *
 * @returns The record and its parsed date, or null if the line is not a
 *   JSON object with string `date` and `outfile` fields and a valid date
 */
export function parseLogLine(
  line: string,
): { record: LogRecord; timestamp: CaptureTime } | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line.trim());
  } catch {
    return null;
  }

  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  if (!("date" in parsed) || !("outfile" in parsed)) {
    return null;
  }

  const { date, outfile } = parsed;
  if (typeof date !== "string" || typeof outfile !== "string") {
    return null;
  }

  let description: string | null = null;
  const rawDescription = "description" in parsed ? parsed.description : null;
  if (typeof rawDescription === "string") {
    description = rawDescription;
  } else if (rawDescription !== null && rawDescription !== undefined) {
    return null;
  }

  const timestamp = parseIsoTimestamp(date);
  if (!timestamp) {
    return null;
  }

  return {
    record: { date, outfile, description },
    timestamp,
  };
}

/**
 * Tags one image described by the log.
 *
 * Checks that the source folder, destination folder and log file exist,
 * then scans the log for the first line that parses and runs the
 * metadata pipeline for it. Lines that do not parse are skipped. The
 * scan stops after the first record; later lines are never read.
 *
 * @param options - Paths and metadata shared by every record
 * @returns The request that was processed (null if no line parsed)
 *   and the number of lines skipped before it
 * @throws PathNotFoundError if any of the three paths is missing
 *
 * @example
 * ```typescript
 * const result = runTagger({
 *   src: "photos", dest: "tagged", logfile: "photos.jsonl",
 *   geo: { latitude: 45, longitude: -93 }, altitude: null,
 *   tags: ["school"], verbose: false,
 * });
 * console.log(result.request?.destination); // "tagged/a.jpg"
 * ```
 */
export function runTagger(options: TaggerOptions): TaggerResult {
  const { src, dest, logfile } = options;

  if (!existsSync(src)) {
    throw new PathNotFoundError("source path", src);
  }
  if (!existsSync(dest)) {
    throw new PathNotFoundError("destination path", dest);
  }
  if (!existsSync(logfile)) {
    throw new PathNotFoundError("json log file", logfile);
  }

  const lines = readFileSync(logfile, "utf8").split(/\r?\n/);
  let skippedLines = 0;

  for (const line of lines) {
    if (line.trim() === "") {
      continue;
    }

    const entry = parseLogLine(line);
    if (!entry) {
      skippedLines++;
      continue;
    }

    const { record, timestamp } = entry;
    if (options.verbose) {
      console.log(`Date: ${record.date}`);
    }

    const request: ImageMetadataRequest = Object.freeze({
      source: join(src, record.outfile),
      destination: join(dest, record.outfile),
      description: record.description,
      timestamp,
      geo: options.geo,
      altitude: options.altitude,
      tags: options.tags,
    });

    const container = tagImage(request);
    if (options.verbose) {
      console.log("GPS:", Object.fromEntries(container.gps));
      if (options.tags) {
        console.log(`Keywords: ${options.tags.join(",")}`);
      }
    }

    // only the first usable record is processed per run
    return { request, skippedLines };
  }

  return { request: null, skippedLines };
}
