export {
  type Result,
  Ok,
  Err,
  isOk,
  isErr,
  map,
  andThen,
  unwrapOr,
} from "./result.js";

export {
  ContractViolation,
  assertNonNegativeInteger,
  assertPositiveInteger,
  assertNonNegative,
  assertHopCap,
} from "./errors.js";

export {
  type TextContent,
  type ToolResponse,
  type DescribableError,
  textResponse,
  errorResponse,
  resultToStructuredResponse,
} from "./mcp.js";

export {
  type ServerConfig,
  type ServerBootstrapOptions,
  bootstrapServer,
  runServer,
  McpServer,
} from "./server.js";
