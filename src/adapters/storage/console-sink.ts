/**
 * Console Sink
 *
 * Writes user-facing lines to stdout.
 */

import type { OutputSink } from "../../core/ports/output-sink.port.js";

export const consoleSink: OutputSink = {
  writeLine: (line) => console.log(line),
};
