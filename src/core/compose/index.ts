export { ComposeClient } from "./ComposeClient";
export type { ComposeClientOptions, ExecOptions } from "./ComposeClient";
