export * from "./core/time";

export * from "./equation/equation";

// Raw configuration input (file format)
export * from "./config/config";

// Produced note events
export * from "./notes/notes";

export * from "./evaluator/evaluator";

export * from "./scheduler/scheduler";

export * from "./pipeline/interfaces";

export * from "./diagnostics/diagnostics";
