// Greedy line packing for Telegram's per-message limit.
// A line is never split: an over-long line becomes its own (oversized) chunk.
// Joining the chunk texts with "\n" gives back the rendered report exactly.

import type { Chunk, ReportBody } from "../types/update.js";
import { renderReport } from "./composer.js";

export const TELEGRAM_MAX_MESSAGE_LENGTH = 4096;

/** Headroom kept below the limit for the transport's own encoding overhead. */
export const CHUNK_SAFETY_MARGIN = 256;

export function chunkReport(
  body: ReportBody,
  maxChunkLength: number = TELEGRAM_MAX_MESSAGE_LENGTH,
  safetyMargin: number = CHUNK_SAFETY_MARGIN,
): Chunk[] {
  if (body.lines.length === 0) return [];

  const whole = renderReport(body);
  if (whole.length <= maxChunkLength) return [{ text: whole, ordinal: 1 }];

  const budget = maxChunkLength - safetyMargin;
  const chunks: Chunk[] = [];
  let buffer: string[] = [];
  // Rendered size counting one line break per buffered line.
  let size = 0;

  const flush = (): void => {
    chunks.push({ text: buffer.join("\n"), ordinal: chunks.length + 1 });
    buffer = [];
    size = 0;
  };

  for (const line of body.lines) {
    if (buffer.length > 0 && size + line.length + 1 > budget) flush();
    buffer.push(line);
    size += line.length + 1;
  }
  if (buffer.length > 0) flush();

  return chunks;
}

/** Inverse of chunkReport. */
export function reassemble(chunks: readonly Chunk[]): string {
  return chunks.map((chunk) => chunk.text).join("\n");
}
