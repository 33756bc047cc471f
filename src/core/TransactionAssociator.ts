/**
 * TallyScan – Transaction association
 *
 * Pairs amount candidates with time candidates by line proximity.
 *
 * Every occurrence is paired on its own. Pairing is greedy on the global
 * list of (amount, time) pairs sorted by line distance, ties broken by
 * amount order then time order. A clock value belongs to one sale: once
 * paired it is used up for every other amount, except for a repeated
 * reading of the same sale (equal amount) when `collapseRepeats` is on.
 * Such repeats produce identical records, which are then collapsed.
 */

import type { AssociationConfig, ParsingConfig } from "./config";
import { stripAccents } from "../parser/primitives";
import type {
  AmountCandidate,
  NotFound,
  PaymentMethod,
  TimeCandidate,
  TransactionRecord,
} from "../schema/TransactionRecord";
import { NOT_FOUND } from "../schema/TransactionRecord";
import type { TallyScanLogger } from "../utils/logger";
import { silentLogger } from "../utils/logger";

export interface AssociationInput {
  amounts: readonly AmountCandidate[];
  times: readonly TimeCandidate[];
  date: string;
  reference: string;
}

export type AssociatorConfig = AssociationConfig & Pick<ParsingConfig, "minimumAmount">;

interface Pairing {
  amount: number;
  time: number;
  distance: number;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Infer the payment method from a file/quadrant reference */
export function inferPaymentMethod(reference: string): PaymentMethod {
  const r = stripAccents(reference).toLowerCase();
  if (r.includes("credit")) return "credit";
  if (r.includes("debit")) return "debit";
  if (/(^|[^a-z])pix([^a-z]|$)/.test(r)) return "pix";
  return NOT_FOUND;
}

/** Drop records whose (time, amount) already appeared; first one wins */
export function collapseRecords(records: readonly TransactionRecord[]): TransactionRecord[] {
  const seen = new Set<string>();
  return records.filter((record) => {
    const key = `${record.time}|${record.amount}`;
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function hourOf(time: string): number {
  return Number(time.slice(0, 2));
}

// ─── Associator ──────────────────────────────────────────────────────────────

export class TransactionAssociator {
  private readonly config: AssociatorConfig;
  private readonly logger: TallyScanLogger;

  constructor(config: AssociatorConfig, logger: TallyScanLogger = silentLogger) {
    this.config = config;
    this.logger = logger;
  }

  associate(input: AssociationInput): TransactionRecord[] {
    const { window, validHours, collapseRepeats, minimumAmount } = this.config;
    const { amounts, times } = input;
    const paymentMethod = inferPaymentMethod(input.reference);

    // 1. Candidate pairs within the window, nearest first
    const pairs: Pairing[] = [];
    amounts.forEach((a, ai) => {
      times.forEach((t, ti) => {
        const d = Math.abs(a.position - t.position);
        if (d <= window) pairs.push({ amount: ai, time: ti, distance: d });
      });
    });
    pairs.sort((p, q) => p.distance - q.distance || p.amount - q.amount || p.time - q.time);

    // 2. Greedy assignment; a clock value is used up by the sale it was paired with
    const timeFor = new Map<number, number>();
    const consumed = new Set<number>();
    const usedBy = new Map<string, string>();
    for (const pair of pairs) {
      if (timeFor.has(pair.amount) || consumed.has(pair.time)) continue;
      const clock = times[pair.time].value;
      const sale = amounts[pair.amount].value;
      const owner = usedBy.get(clock);
      if (owner !== undefined && !(collapseRepeats && owner === sale)) continue;
      timeFor.set(pair.amount, pair.time);
      consumed.add(pair.time);
      usedBy.set(clock, sale);
    }

    const paired: TransactionRecord[] = [];
    amounts.forEach((candidate, ai) => {
      const ti = timeFor.get(ai);
      const time = ti === undefined ? NOT_FOUND : times[ti].value;
      const value = candidate.amount;
      const amount: number | NotFound = value >= minimumAmount ? value : NOT_FOUND;

      if (amount === NOT_FOUND && time === NOT_FOUND) {
        this.logger.debug(`Dropping amount ${value.toFixed(2)} below minimum with no time`);
        return;
      }
      paired.push({ date: input.date, time, amount, paymentMethod, reference: input.reference });
    });

    // 3. Clock values nobody claimed
    const orphans: TransactionRecord[] = [];
    const orphanTimes = new Set<string>();
    for (const { value, flagged } of times) {
      if (usedBy.has(value) || flagged || orphanTimes.has(value)) continue;
      const hour = hourOf(value);
      if (hour < validHours.from || hour > validHours.to) continue;
      orphanTimes.add(value);
      orphans.push({
        date: input.date,
        time: value,
        amount: NOT_FOUND,
        paymentMethod,
        reference: input.reference,
      });
    }

    const records = collapseRepeats ? collapseRecords(paired) : paired;
    this.logger.debug(
      `${input.reference}: ${records.length} paired/amount records, ${orphans.length} orphan times`,
    );

    return sortRecords([...records, ...orphans]);
  }
}

/**
 * Ascending by time; "not-found" last. Stable, so paired records keep
 * their place ahead of orphans with the same time.
 */
export function sortRecords(records: readonly TransactionRecord[]): TransactionRecord[] {
  return [...records].sort((a, b) => {
    if (a.time === b.time) return 0;
    if (a.time === NOT_FOUND) return 1;
    if (b.time === NOT_FOUND) return -1;
    return a.time < b.time ? -1 : 1;
  });
}
