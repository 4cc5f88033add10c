export * from "./hooks";
export { getCurrentEngine, tryGetCurrentEngine } from "./render-context";
