import { Transaction } from '../domain/models';

/**
 * Transaction store interface - abstracts where lifecycle records live
 *
 * The lifecycle service reads with `findById`, applies a transition and
 * writes back with `save`. Implementations own the durable copy of each
 * record; nothing here provides isolation between concurrent writers.
 */
export interface TransactionStore {
  /**
   * Insert or overwrite the record with the same id
   */
  save(transaction: Transaction): void;

  /**
   * Look up a record; `null` when no record exists for the id
   */
  findById(id: string): Transaction | null;

  /**
   * Whether a record exists for the id
   */
  exists(id: string): boolean;
}
