export {
  DEFAULT_ROOT_MARKER,
  findRepoRoot,
  resolveRepoRoot,
  resolveToolDir,
} from "./locator";
