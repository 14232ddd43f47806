export { LifecycleController, type LifecycleOptions } from "./controller";
export { BackupLogStore, backupFileName, systemClock, type Clock } from "./backup-store";
export { InstanceDirectories } from "./instance-dirs";
export {
  TmuxClient,
  spawnCommand,
  tmuxCommands,
  type CommandOutput,
  type CommandRunner,
  type MultiplexerClient,
} from "./multiplexer";
export { err, isPreconditionFailure, ok, type FleetError, type FleetErrorKind, type Result } from "./result";
export { loadSettings, type Settings } from "./settings";
export { instanceState, type InstanceState, type InstanceStatus } from "./types";
export { validateName, validatePort, type InstanceName, type Port } from "./validate";
