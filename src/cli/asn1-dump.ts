import { parseArgs } from "node:util";
import { ZodError } from "zod";
import {
  decodeOptionsFromConfig,
  loadConfig,
  resolveDecodeOptions,
} from "../common/config.js";
import type { ResolvedDecodeOptions } from "../common/config.js";
import { Asn1DecodeError } from "../common/errors.js";
import { createLogger } from "../common/logger.js";
import { FileByteSource } from "../parser/byte-source.js";
import { TagDecoder } from "../parser/tag-decoder.js";
import { exportText } from "../text/tag-formatter.js";

const log = createLogger("asn1-dump");

export const USAGE =
  "Usage: asn1-dump <file> [--max-depth N] [--no-embedded] [--single]\n";

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

interface CliRequest {
  file: string;
  options: ResolvedDecodeOptions;
}

function parseCli(
  argv: readonly string[],
  env: Record<string, string | undefined>,
): CliRequest | string {
  const { values, positionals } = parseArgs({
    args: [...argv],
    options: {
      "max-depth": { type: "string" },
      "no-embedded": { type: "boolean" },
      single: { type: "boolean" },
    },
    allowPositionals: true,
  });
  if (positionals.length !== 1) {
    return `expected exactly one file; got ${positionals.length}`;
  }

  const defaults = decodeOptionsFromConfig(loadConfig(env));
  const maxDepth = values["max-depth"];
  const options = resolveDecodeOptions({
    ...defaults,
    maxDepth: maxDepth === undefined ? defaults.maxDepth : Number(maxDepth),
    expandEmbedded: values["no-embedded"] ? false : defaults.expandEmbedded,
    singleNode: values.single ?? false,
  });
  return { file: positionals[0], options };
}

/**
 * Decode every top-level tag in a file and print the tree as text.
 * @returns Process exit code: 0 on success, 1 when the file cannot be read or
 *   decoded, 2 on bad usage.
 */
export function run(
  argv: readonly string[],
  io: CliIo,
  env: Record<string, string | undefined> = process.env,
): number {
  let request: CliRequest | string;
  try {
    request = parseCli(argv, env);
  } catch (e) {
    // parseArgs rejects unknown flags with a TypeError
    if (e instanceof ZodError || e instanceof TypeError) {
      request = e.message;
    } else {
      throw e;
    }
  }
  if (typeof request === "string") {
    io.stderr(`error: ${request}\n${USAGE}`);
    return 2;
  }

  const { file, options } = request;
  let source: FileByteSource | undefined;
  try {
    source = new FileByteSource(file);
    const decoder = new TagDecoder(options);
    const tags = options.singleNode
      ? [decoder.decode(source)]
      : decoder.decodeAll(source);
    for (const tag of tags) io.stdout(exportText(tag));
    return 0;
  } catch (e) {
    if (e instanceof Asn1DecodeError) {
      log.error({ code: e.code, offset: e.offset, file }, "decode failed");
      io.stderr(`error: ${e.message}\n`);
      return 1;
    }
    if (isFileSystemError(e)) {
      log.error({ code: e.code, file }, "cannot read input");
      io.stderr(`error: ${e.message}\n`);
      return 1;
    }
    throw e;
  } finally {
    source?.close();
  }
}

// Errors from node:fs carry a string code such as ENOENT or EISDIR
function isFileSystemError(
  e: unknown,
): e is NodeJS.ErrnoException & { code: string } {
  return e instanceof Error && "code" in e && typeof e.code === "string";
}
