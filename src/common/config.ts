import { z } from "zod";

export const DEFAULT_MAX_DEPTH = 100;
// Largest payload a single primitive tag may declare (2^31 - 1).
export const DEFAULT_MAX_PAYLOAD_LENGTH = 0x7fffffff;

export const DecodeOptionsSchema = z.object({
  /** Decode only the header of a constructed tag, leaving its body unread. */
  singleNode: z.boolean().default(false),
  /** Try to decode BIT STRING payloads as nested ASN.1. */
  expandEmbedded: z.boolean().default(true),
  maxDepth: z.number().int().positive().default(DEFAULT_MAX_DEPTH),
  maxPayloadLength: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_MAX_PAYLOAD_LENGTH),
});

export type DecodeOptions = z.input<typeof DecodeOptionsSchema>;
export type ResolvedDecodeOptions = z.output<typeof DecodeOptionsSchema>;

export function resolveDecodeOptions(
  options?: DecodeOptions,
): ResolvedDecodeOptions {
  return DecodeOptionsSchema.parse(options ?? {});
}

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .regex(/^\d+$/, "expected a non-negative integer")
    .transform(Number)
    .default(String(fallback));

// Logging settings (LOG_LEVEL, NODE_ENV) are read by the logger itself.
const ConfigSchema = z.object({
  ASN1_MAX_DEPTH: numberFromEnv(DEFAULT_MAX_DEPTH),
  ASN1_MAX_PAYLOAD_LENGTH: numberFromEnv(DEFAULT_MAX_PAYLOAD_LENGTH),
  ASN1_EXPAND_EMBEDDED: z
    .enum(["true", "false"])
    .transform((v) => v === "true")
    .default("true"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Config {
  return ConfigSchema.parse(env);
}

/** Decoder defaults taken from the environment configuration. */
export function decodeOptionsFromConfig(config: Config): ResolvedDecodeOptions {
  return resolveDecodeOptions({
    expandEmbedded: config.ASN1_EXPAND_EMBEDDED,
    maxDepth: config.ASN1_MAX_DEPTH,
    maxPayloadLength: config.ASN1_MAX_PAYLOAD_LENGTH,
  });
}
