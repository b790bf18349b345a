export { createCheckEnvCommand } from "./check-env";
export { createLogsCommand } from "./logs";
export { createPlanCommand } from "./plan";
export { createRepairCommand, REPAIR_CONFIRMATION } from "./repair";
export { createRestartCommand } from "./restart";
export { createServeCommand } from "./serve";
export { createStatusCommand } from "./status";
export { createUpCommand } from "./up";
