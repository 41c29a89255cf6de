/**
 * Human-readable sequence codes such as `ERASE-20240601090000-0042`.
 *
 * The serial is the position of the code's creation entry in its ledger
 * scope, so two codes of one prefix never share it.
 *
 * @module utils/sequenceCodes
 */

export function sequenceCode(prefix: string, at: Date, serial: number): string {
  if (!Number.isInteger(serial) || serial < 1) {
    throw new RangeError(`Sequence serial must be a positive integer, got ${serial}`);
  }
  const stamp = at.toISOString().replace(/[-:T]/g, '').slice(0, 14);
  return `${prefix}-${stamp}-${String(serial).padStart(4, '0')}`;
}
