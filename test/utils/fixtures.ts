/**
 * Shared helpers for rendering and file tests
 */

import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { OutputSink } from "../../src/render/renderer";
import type { FastqRecord } from "../../src/types";

/**
 * Sink that keeps everything written to it
 */
export class CaptureSink implements OutputSink {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join("");
  }

  /** Written lines; the trailing newline yields a final empty entry */
  get lines(): string[] {
    return this.text.split("\n");
  }
}

/** 256-color foreground sequence as chalk emits it */
export function fg(color: number, text: string): string {
  return `\u001B[38;5;${color}m${text}\u001B[39m`;
}

/** Dim sequence as chalk emits it */
export function dim(text: string): string {
  return `\u001B[2m${text}\u001B[22m`;
}

/** Bold sequence as chalk emits it */
export function bold(text: string): string {
  return `\u001B[1m${text}\u001B[22m`;
}

export function stripAnsi(text: string): string {
  return text.replace(/\u001B\[[0-9;]*m/g, "");
}

/**
 * Build a record whose quality defaults to all Q40 ('I')
 */
export function makeRecord(id: string, sequence: string, quality?: string): FastqRecord {
  return {
    header: `@${id}`,
    sequence,
    separator: "+",
    quality: quality ?? "I".repeat(sequence.length),
  };
}

/**
 * Serialize records as four-line FASTQ text
 */
export function toFastqText(records: readonly FastqRecord[]): string {
  return records
    .map((r) => `${r.header}\n${r.sequence}\n${r.separator}\n${r.quality}\n`)
    .join("");
}

/**
 * Temporary directory removed by the returned cleanup function
 */
export function createFixtureDir(): { dir: string; cleanup: () => void } {
  const dir = mkdtempSync(join(tmpdir(), "fqview-test-"));
  return {
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

/**
 * Readable stream that emits the given chunks, then closes
 */
export function streamOf(...chunks: Uint8Array[]): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) {
        controller.enqueue(chunk);
      }
      controller.close();
    },
  });
}

export const encode = (text: string): Uint8Array => new TextEncoder().encode(text);
