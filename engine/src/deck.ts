import { z } from "zod";
import { InvalidRecordError } from "./errors.js";
import { GridDims } from "./grid.js";

/** One token of a record; `null` marks a defaulted item. */
export type DeckItem = number | string | null;
export type DeckRecord = DeckItem[];

export interface DeckKeyword {
  name: string;
  records: DeckRecord[];
}

const itemSchema = z.union([z.number(), z.string(), z.null()]);
const keywordSchema = z.object({
  name: z.string().min(1),
  records: z.array(z.array(itemSchema)).default([]),
});
const deckSchema = z.object({ keywords: z.array(keywordSchema) });

/** Validate an already tokenized deck, e.g. one loaded from JSON. */
export function parseDeck(raw: unknown): DeckKeyword[] {
  return deckSchema.parse(raw).keywords;
}

export function isDefaulted(record: DeckRecord, index: number): boolean {
  const item = record[index];
  return item === undefined || item === null;
}

export function readOptionalNumber(keyword: string, record: DeckRecord, index: number): number | undefined {
  const item = record[index];
  if (item === undefined || item === null) return undefined;
  if (typeof item === "number") return item;
  const parsed = Number(item);
  if (item.trim() === "" || Number.isNaN(parsed)) {
    throw new InvalidRecordError(keyword, `item ${index + 1} must be numeric, got '${item}'`);
  }
  return parsed;
}

export function readNumber(keyword: string, record: DeckRecord, index: number): number {
  const value = readOptionalNumber(keyword, record, index);
  if (value === undefined) throw new InvalidRecordError(keyword, `item ${index + 1} is required`);
  return value;
}

export function readInteger(keyword: string, record: DeckRecord, index: number): number {
  const value = readNumber(keyword, record, index);
  if (!Number.isInteger(value)) throw new InvalidRecordError(keyword, `item ${index + 1} must be an integer, got ${value}`);
  return value;
}

export function readOptionalString(keyword: string, record: DeckRecord, index: number): string | undefined {
  const item = record[index];
  if (item === undefined || item === null) return undefined;
  if (typeof item === "number") throw new InvalidRecordError(keyword, `item ${index + 1} must be a string, got ${item}`);
  return item.trim();
}

export function readString(keyword: string, record: DeckRecord, index: number): string {
  const value = readOptionalString(keyword, record, index);
  if (value === undefined || value === "") throw new InvalidRecordError(keyword, `item ${index + 1} is required`);
  return value;
}

/** All items of the first record as numbers; the data block of an assignment keyword. */
export function readDataBlock(keyword: DeckKeyword): number[] {
  const record = keyword.records[0] ?? [];
  return record.map((_, idx) => readNumber(keyword.name, record, idx));
}

export function gridFromDeck(deck: DeckKeyword[]): GridDims {
  const dimens = deck.find((kw) => kw.name.trim().toUpperCase() === "DIMENS");
  if (!dimens) throw new InvalidRecordError("DIMENS", "deck has no DIMENS keyword");
  const record = dimens.records[0] ?? [];
  return new GridDims(readInteger("DIMENS", record, 0), readInteger("DIMENS", record, 1), readInteger("DIMENS", record, 2));
}
