/**
 * Core library implementations
 */

export * from "./ApplicationContext";
export * from "./RequestContext";
export * from "./TimeoutManager";
export * from "./OutputBuffer";
export * from "./CompletionBridge";
export * from "./OperationLock";
export * from "./ProjectResolver";
export * from "./ResultCache";
export * from "./RunReaper";
export * from "./RunRegistry";
export * from "./TestResultExtractor";
export * from "./BuildService";
export * from "./TestService";
export * from "./DebugFacade";
export * from "./BridgeService";
export * from "./BridgeTools";
export * from "./MCPServer";
export * from "./ConfigLoader";
export * from "./ErrorHandler";
export * from "./LocalHost";
export * from "./LocalCompilerManager";
export * from "./LocalRunManager";
export * from "./LocalTestLauncher";
export * from "./LocalProcess";
export * from "./ProcessTerminator";
export * from "./ServiceMessageParser";
