/**
 * Core interfaces for the devhost bridge
 */

export * from "./IHostEnvironment";
export * from "./IDebugger";
export * from "./ITimeoutManager";
export * from "./IOutputBuffer";
export * from "./IOperationLock";
export * from "./IRunRegistry";
