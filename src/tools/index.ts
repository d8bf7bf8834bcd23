export {
  buildArgsSchema,
  bindTool,
  bindTools,
  ToolHandlerMissingError,
  ToolArgumentsError,
  type BoundTool,
  type BindToolsOptions,
  type ToolArgs,
  type ToolArgsSchema,
  type ToolHandler,
} from "./binding.js";
