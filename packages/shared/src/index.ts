export type * from "./jobs.js";
export type * from "./events.js";
