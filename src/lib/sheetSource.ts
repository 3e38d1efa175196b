// src/lib/sheetSource.ts
import fs from "fs";
import path from "path";
import { SourceUnreadableError } from "./errors";

/**
 * Where a spreadsheet's bytes live. Extraction code only ever calls
 * `openForRead`, so it never cares which kind it was handed.
 */
export type SheetSource =
  | { kind: "path"; path: string }
  | { kind: "buffer"; buffer: Buffer; label: string };

export function fromPath(filePath: string): SheetSource {
  return { kind: "path", path: filePath };
}

export function fromBuffer(buf: Uint8Array | ArrayBuffer, label: string): SheetSource {
  return { kind: "buffer", buffer: toNodeBuffer(buf), label };
}

export function sourceLabel(source: SheetSource): string {
  return source.kind === "path" ? path.basename(source.path) : source.label;
}

export function openForRead(source: SheetSource): Buffer {
  if (source.kind === "buffer") return source.buffer;

  if (!fs.existsSync(source.path)) {
    throw new SourceUnreadableError(`File not found: ${source.path}`);
  }
  try {
    return fs.readFileSync(source.path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SourceUnreadableError(`Cannot read ${source.path}: ${reason}`);
  }
}

export function toNodeBuffer(buf: Uint8Array | ArrayBuffer): Buffer {
  // if it's already a Node Buffer, return it
  if (Buffer.isBuffer(buf)) return buf;
  if (buf instanceof ArrayBuffer) return Buffer.from(new Uint8Array(buf));
  return Buffer.from(buf.buffer, buf.byteOffset, buf.byteLength);
}
