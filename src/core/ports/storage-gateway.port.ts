/**
 * Storage Gateway Port
 *
 * Secondary port for persisting user records.
 */

import type { UserRecord } from "../domain/entities/user-record.js";

export interface StorageGateway {
  /**
   * Persist a fully constructed record.
   * Implementations report failure by throwing.
   */
  save(record: UserRecord): void;
}
