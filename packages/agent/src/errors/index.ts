export { AgentError } from "./agent-error.js";
export { ConfigurationError } from "./configuration-error.js";
export { CapabilityDiscoveryError } from "./capability-discovery-error.js";
export { ControlPlaneError, NotifyError, PollError } from "./control-plane-error.js";
export { ProcessKillError, ProcessSpawnError } from "./process-error.js";
