export { createComposeEnvironment, parseContainerState, type ComposeEnvironmentConfig } from "./compose";
export { createDockerRunner, type CommandOptions, type CommandResult, type CommandRunner } from "./process";
