export { runStages } from "./runner";
export { buildSetupStages } from "./stages";
