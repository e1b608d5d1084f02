export * from "./schemas/daemon-config";
export * from "./schemas/state-space";
export * from "./schemas/status";
