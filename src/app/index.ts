export { joinUrl, provision } from "./provision";
export type { ComposeOperations, ProvisionContext } from "./provision";
