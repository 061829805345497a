import { Transaction, TransactionStore } from '../../../core';

/**
 * In-memory transaction store
 * Keeps detached copies, so records handed out can be mutated freely
 * without touching stored state until they are saved again.
 */
export class InMemoryTransactionStore implements TransactionStore {
  private readonly transactions: Map<string, Transaction> = new Map();

  save(transaction: Transaction): void {
    this.transactions.set(transaction.id, transaction.clone());
  }

  findById(id: string): Transaction | null {
    const transaction = this.transactions.get(id);
    return transaction ? transaction.clone() : null;
  }

  exists(id: string): boolean {
    return this.transactions.has(id);
  }

  /**
   * Number of stored transactions
   */
  count(): number {
    return this.transactions.size;
  }

  /**
   * Snapshot of every stored transaction, in insertion order (for testing)
   */
  getAll(): Transaction[] {
    return Array.from(this.transactions.values(), (t) => t.clone());
  }

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.transactions.clear();
  }
}
