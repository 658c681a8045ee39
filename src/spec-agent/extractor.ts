/**
 * Segment Extractor
 *
 * Splits generated text into the metadata segment (everything before the
 * first begin marker) and the delimited code blocks that follow it:
 *
 *   ---BEGIN alu.v---
 *   module alu(...); ... endmodule
 *   ---END alu.v---
 *
 * Scanning is left to right and non-overlapping. A begin marker without a
 * matching end marker is skipped and the scan resumes right after it, so
 * malformed marker text only ever yields fewer blocks.
 */

import { log, emit, TelemetryEvents } from "../utils/telemetry.js";
import { DEFAULT_BLOCK_KEY, type ExtractedSegments } from "./types.js";

const BEGIN_PREFIX = "---BEGIN";

/** Token shared by the generic single-block markers */
export const GENERIC_BLOCK_TOKEN = "VERILOG";

const BEGIN_MARKER = /---BEGIN\s+([A-Za-z0-9_.-]+)---/y;

interface MarkedBlock {
  token: string;
  body: string;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&");
}

function findEndMarker(text: string, token: string, from: number): { index: number; length: number } | null {
  const endMarker = new RegExp(`---END\\s+${escapeRegExp(token)}---`, "g");
  endMarker.lastIndex = from;
  const match = endMarker.exec(text);
  return match ? { index: match.index, length: match[0].length } : null;
}

/**
 * Scan for BEGIN/END pairs whose token passes `accept`.
 */
function scanMarkedBlocks(text: string, accept: (token: string) => boolean): MarkedBlock[] {
  const blocks: MarkedBlock[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    const begin = text.indexOf(BEGIN_PREFIX, cursor);
    if (begin === -1) break;

    BEGIN_MARKER.lastIndex = begin;
    const marker = BEGIN_MARKER.exec(text);
    if (!marker || !accept(marker[1])) {
      cursor = begin + BEGIN_PREFIX.length;
      continue;
    }

    const token = marker[1];
    const bodyStart = begin + marker[0].length;
    const end = findEndMarker(text, token, bodyStart);
    if (!end) {
      log.debug({ token, offset: begin }, "Unterminated code block marker skipped");
      cursor = bodyStart;
      continue;
    }

    blocks.push({ token, body: text.slice(bodyStart, end.index).trim() });
    cursor = end.index + end.length;
  }

  return blocks;
}

/**
 * Metadata segment: text preceding the first begin marker.
 */
export function extractMetadataText(raw: string): string {
  const firstMarker = raw.indexOf(BEGIN_PREFIX);
  return (firstMarker === -1 ? raw : raw.slice(0, firstMarker)).trim();
}

/**
 * Collect delimited code blocks keyed by filename.
 *
 * Named blocks win; the generic VERILOG pair is only consulted when no named
 * block exists. Like a repeated named block, a repeated generic block keeps
 * its last occurrence (as `default.v`).
 */
export function extractCodeBlocks(raw: string): Map<string, string> {
  const codeBlocks = new Map<string, string>();

  for (const block of scanMarkedBlocks(raw, (token) => token !== GENERIC_BLOCK_TOKEN)) {
    if (codeBlocks.has(block.token)) {
      log.warn({ file_name: block.token }, "Duplicate code block name; keeping the later block");
      emit(TelemetryEvents.CodeBlockKeyCollision, { file_name: block.token });
    }
    codeBlocks.set(block.token, block.body);
  }

  if (codeBlocks.size === 0) {
    const generic = scanMarkedBlocks(raw, (token) => token === GENERIC_BLOCK_TOKEN);
    const last = generic.at(-1);
    if (last) {
      if (generic.length > 1) {
        log.warn({ block_count: generic.length }, "Repeated generic VERILOG block; keeping the last one");
        emit(TelemetryEvents.CodeBlockKeyCollision, { file_name: DEFAULT_BLOCK_KEY });
      }
      codeBlocks.set(DEFAULT_BLOCK_KEY, last.body);
    } else {
      log.warn("No code block markers found in generated output");
    }
  }

  return codeBlocks;
}

export function extractSegments(raw: string): ExtractedSegments {
  const segments: ExtractedSegments = {
    metadataText: extractMetadataText(raw),
    codeBlocks: extractCodeBlocks(raw),
  };

  emit(TelemetryEvents.CodeBlocksExtracted, {
    metadata_chars: segments.metadataText.length,
    block_count: segments.codeBlocks.size,
    file_names: [...segments.codeBlocks.keys()],
  });

  return segments;
}
