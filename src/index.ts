/**
 * devhost bridge - Main entry point
 *
 * Request/response access to a development host's long-running build,
 * test, run and debugger operations, with bounded waits and one build and
 * one test run at a time.
 */

export * from "./types";
export * from "./interfaces";
export * from "./lib";
