import type { TerminalJobStatus } from "./jobs.js";

/** Events delivered by GET /{build,test}/:id/logs */
export type LogStreamEvent =
  | { type: "line"; line: string }
  | { type: "complete"; status: TerminalJobStatus };

export type LogStreamEventType = LogStreamEvent["type"];
