// Attribute keys. GenAI keys follow the OpenTelemetry GenAI semantic conventions;
// `acp.*` keys are specific to this proxy.

export const ATTR_GEN_AI_OPERATION_NAME = 'gen_ai.operation.name'
export const ATTR_GEN_AI_CONVERSATION_ID = 'gen_ai.conversation.id'
export const ATTR_GEN_AI_PROVIDER_NAME = 'gen_ai.provider.name'
export const ATTR_GEN_AI_AGENT_NAME = 'gen_ai.agent.name'
export const ATTR_GEN_AI_AGENT_ID = 'gen_ai.agent.id'
export const ATTR_GEN_AI_INPUT_MESSAGES = 'gen_ai.input.messages'
export const ATTR_GEN_AI_OUTPUT_MESSAGES = 'gen_ai.output.messages'
export const ATTR_GEN_AI_RESPONSE_FINISH_REASONS = 'gen_ai.response.finish_reasons'
export const ATTR_GEN_AI_TOOL_NAME = 'gen_ai.tool.name'
export const ATTR_GEN_AI_TOOL_CALL_ID = 'gen_ai.tool.call.id'
export const ATTR_GEN_AI_TOOL_TYPE = 'gen_ai.tool.type'
export const ATTR_GEN_AI_TOOL_CALL_ARGUMENTS = 'gen_ai.tool.call.arguments'
export const ATTR_GEN_AI_TOOL_CALL_RESULT = 'gen_ai.tool.call.result'

export const ATTR_RPC_SYSTEM = 'rpc.system'
export const ATTR_RPC_METHOD = 'rpc.method'
export const ATTR_JSONRPC_REQUEST_ID = 'jsonrpc.request.id'
export const ATTR_NETWORK_TRANSPORT = 'network.transport'
export const ATTR_ERROR_TYPE = 'error.type'

export const ATTR_ACP_METHOD_NAME = 'acp.method.name'
export const ATTR_ACP_PROTOCOL_VERSION = 'acp.protocol.version'
export const ATTR_ACP_AGENT_VERSION = 'acp.agent.version'
export const ATTR_ACP_CLIENT_NAME = 'acp.client.name'
export const ATTR_ACP_CLIENT_VERSION = 'acp.client.version'
export const ATTR_ACP_TIME_TO_FIRST_TOKEN_MS = 'acp.time_to_first_token_ms'
export const ATTR_ACP_TOOL_KIND = 'acp.tool.kind'

export const OPERATION_INVOKE_AGENT = 'invoke_agent'
export const OPERATION_EXECUTE_TOOL = 'execute_tool'

export const TRANSPORT_PIPE = 'pipe'
