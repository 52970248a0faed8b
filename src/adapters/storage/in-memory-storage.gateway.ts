/**
 * In-memory storage gateway (for testing/development)
 */

import type { UserRecord } from "../../core/domain/entities/user-record.js";
import type { StorageGateway } from "../../core/ports/storage-gateway.port.js";

export class InMemoryStorageGateway implements StorageGateway {
  private records: UserRecord[] = [];

  save(record: UserRecord): void {
    this.records.push(record);
  }

  /**
   * Saved records in call order. Repeated saves of the same record are kept.
   */
  getSaved(): readonly UserRecord[] {
    return [...this.records];
  }

  findById(id: number): UserRecord | undefined {
    return this.records.find((r) => r.id === id);
  }

  clear(): void {
    this.records = [];
  }
}
