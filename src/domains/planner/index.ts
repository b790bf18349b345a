export type { StartupPlan } from "./plan";
export { dependencyClosure, planStartup } from "./plan";
