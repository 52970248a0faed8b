/**
 * Output Sink Port
 *
 * Where user-facing lines are written (stdout in the demo, a buffer in tests).
 */

export interface OutputSink {
  writeLine(line: string): void;
}
