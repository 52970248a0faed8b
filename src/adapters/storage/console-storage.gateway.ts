/**
 * Console Storage Gateway
 *
 * Simulates persistence by writing one human-readable line per saved record.
 */

import type { UserRecord } from "../../core/domain/entities/user-record.js";
import type { StorageGateway } from "../../core/ports/storage-gateway.port.js";
import type { OutputSink } from "../../core/ports/output-sink.port.js";
import { consoleSink } from "./console-sink.js";

export interface ConsoleStorageGatewayConfig {
  /** Defaults to stdout via console.log */
  sink?: OutputSink;
}

export function formatSaveLine(record: UserRecord): string {
  return `Saving user to database: ${record.name} (Email: ${record.email})`;
}

export class ConsoleStorageGateway implements StorageGateway {
  private readonly sink: OutputSink;

  constructor(config: ConsoleStorageGatewayConfig = {}) {
    this.sink = config.sink ?? consoleSink;
  }

  save(record: UserRecord): void {
    this.sink.writeLine(formatSaveLine(record));
  }
}
