export { runCommand, SPAWN_FAILURE_EXIT_CODE } from "./runner";
export type {
  CommandResult,
  CommandRunner,
  OutputMode,
  RunOptions,
} from "./runner";
