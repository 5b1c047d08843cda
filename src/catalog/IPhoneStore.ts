import type { PhoneRecord } from './phoneTypes.js';

/**
 * Read API over the phone catalog.
 *
 * Calls are synchronous: a store holds a snapshot or an embedded database,
 * so a query is answered without suspension points.
 */
export interface IPhoneStore {
  /** Model names in catalog order. */
  listAllNames(): string[];
  /**
   * Case-insensitive lookup: exact name, then "name contains query",
   * then the same containment test with the samsung/galaxy tokens removed.
   */
  getByExactOrSubstringName(name: string): PhoneRecord | null;
  /** Records whose parsed price is at or below max, in catalog order. */
  filterByPricePredicate(max: number): PhoneRecord[];
  listAll(): PhoneRecord[];
  count(): number;
}
