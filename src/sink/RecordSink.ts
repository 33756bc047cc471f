/**
 * TallyScan – Record sinks
 *
 * Persistence is left to the caller; the scanner only hands finished
 * records to whatever implements RecordSink, one day at a time.
 */

import type { TransactionRecord } from "../schema/TransactionRecord";

export interface SinkContext {
  /** Day label the records came from */
  label: string;
  /** Day date, DD/MM/YYYY or "not-found" */
  date: string;
}

export interface RecordSink {
  write(records: readonly TransactionRecord[], context: SinkContext): Promise<void> | void;
}

/** Collects everything in memory */
export class MemoryRecordSink implements RecordSink {
  readonly records: TransactionRecord[] = [];
  readonly writes: SinkContext[] = [];

  write(records: readonly TransactionRecord[], context: SinkContext): void {
    this.records.push(...records);
    this.writes.push(context);
  }

  clear(): void {
    this.records.length = 0;
    this.writes.length = 0;
  }
}

export const RECORD_COLUMNS = ["date", "time", "amount", "paymentMethod", "reference"] as const;

function formatField(value: string, delimiter: string): string {
  if (value.includes(delimiter) || value.includes('"') || /[\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * One delimited line per record, in RECORD_COLUMNS order, with a header
 * row first. Amounts carry two decimals; "not-found" is written as is.
 */
export function toDelimitedRows(
  records: readonly TransactionRecord[],
  delimiter: string = ";",
): string[] {
  const rows = [RECORD_COLUMNS.join(delimiter)];
  for (const r of records) {
    const amount = typeof r.amount === "number" ? r.amount.toFixed(2) : r.amount;
    rows.push(
      [r.date, r.time, amount, r.paymentMethod, r.reference]
        .map((v) => formatField(v, delimiter))
        .join(delimiter),
    );
  }
  return rows;
}
