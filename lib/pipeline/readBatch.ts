import { z } from "zod";
import { BatchError, errorMessage } from "./errors";

const EnvelopeSchema = z.record(z.string(), z.unknown());
const RecordListSchema = z.array(z.unknown());

function toText(input: Uint8Array): string {
  try {
    return new TextDecoder("utf-8", { fatal: true }).decode(input);
  } catch (e) {
    throw new BatchError(`Batch document is not valid UTF-8: ${errorMessage(e)}`, "invalid_encoding");
  }
}

function parseDocument(text: string): unknown {
  const body = text.replace(/^\uFEFF/, "").trim();
  if (!body) throw new BatchError("Batch document is empty", "missing_document");
  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch (e) {
    throw new BatchError(`Batch document is not valid JSON: ${errorMessage(e)}`, "invalid_json");
  }
}

/**
 * Pull the record list out of a fetched batch document.
 * `input` is the response body (bytes or text) or an already-parsed document.
 * Items are returned as found; checking each one is left to normalization.
 */
export function readBatch(input: unknown, listKey: string): unknown[] {
  if (input == null) throw new BatchError("Batch document is missing", "missing_document");

  const doc =
    input instanceof Uint8Array
      ? parseDocument(toText(input))
      : typeof input === "string"
        ? parseDocument(input)
        : input;

  const envelope = EnvelopeSchema.safeParse(doc);
  if (!envelope.success) {
    throw new BatchError("Batch document is not a JSON object", "not_a_mapping");
  }

  const list = RecordListSchema.safeParse(envelope.data[listKey]);
  if (!list.success) {
    throw new BatchError(`Batch document has no "${listKey}" list`, "missing_list");
  }
  return list.data;
}
