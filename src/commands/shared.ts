import { resolve } from "path";
import { SecretBuffer } from "../auth/secret-buffer";
import { buildClient, CONFIG_FILE, loadConfig, type KvaultClient } from "../config";
import { CancelledError, ValidationError, errorMessage } from "../errors";

export const CONFIG_FLAGS = "-c, --config <path>";
export const CONFIG_DESCRIPTION = `path to ${CONFIG_FILE}`;

export interface ClientOptions {
  config: string;
}

/**
 * Loads config, builds a client and runs `fn`. Ctrl-C aborts the in-flight
 * operation. Failures print `Error: <message>` and set a non-zero exit code.
 */
export async function runWithClient(
  opts: ClientOptions,
  fn: (client: KvaultClient, signal: AbortSignal) => Promise<void>
): Promise<void> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort(new CancelledError("Interrupted"));
  process.once("SIGINT", onInterrupt);

  let client: KvaultClient | undefined;
  try {
    client = buildClient(await loadConfig(resolve(opts.config)));
    await fn(client, controller.signal);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    client?.close();
  }
}

/** commander accumulator for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function parseTags(pairs: string[]): Record<string, string> {
  const tags: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) {
      throw new ValidationError(`Expected key=value, got "${pair}"`);
    }
    tags[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return tags;
}

export function parseDate(value: string): Date {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    throw new ValidationError(`Invalid date: ${value}`);
  }
  return date;
}

/** Reads stdin to the end, without one trailing newline. */
export async function readStdin(stream: NodeJS.ReadableStream = process.stdin): Promise<SecretBuffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  const all = Buffer.concat(chunks);
  for (const chunk of chunks) chunk.fill(0);

  let end = all.length;
  if (end > 0 && all[end - 1] === 0x0a) end--;
  if (end > 0 && all[end - 1] === 0x0d) end--;
  const value = Buffer.from(all.subarray(0, end));
  all.fill(0);
  return SecretBuffer.adopt(value);
}
