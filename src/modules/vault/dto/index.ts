export * from "./amount.dto";
export * from "./sell-note.dto";
export * from "./simulation.dto";
