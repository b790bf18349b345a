export { runAction } from "./action";
export { createProgram } from "./program";
export { createRenderer, type Renderer } from "./render";
export {
  createProcessRuntime,
  createSession,
  type CliRuntime,
  type CliSession,
  type GlobalOptions,
  type Interrupt,
} from "./runtime";
