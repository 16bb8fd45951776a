// Peers: stdio JSON-RPC processes
export { PeerSupervisor, inferLaunchCommand } from './peers/supervisor.js';
export type { SupervisorOptions, PeerStatusReport, DiscoveryReport } from './peers/supervisor.js';
export { PeerProcess, checkLaunchable } from './peers/peer-process.js';
export type { PeerProcessOptions } from './peers/peer-process.js';
export { spawnPeer } from './peers/launcher.js';
export type { PeerChild, PeerLauncher } from './peers/launcher.js';
export { MessageFramer, encodeEnvelope, decodeEnvelope } from './peers/framer.js';
export {
  PeerError,
  LaunchError,
  HandshakeError,
  ProtocolError,
  TimeoutError,
  RemoteError,
  CancellationError,
} from './peers/errors.js';
export type { PeerErrorCode } from './peers/errors.js';
export { PROTOCOL_VERSION, CLIENT_INFO } from './peers/types.js';
export type { PeerConfig, PeerStatus, PeerOutcome, RpcEnvelope, ToolDescriptor, ToolParameter } from './peers/types.js';

// Tools
export { ToolInvoker, normalizeToolReply } from './tools/tool-facade.js';
export type { InvokeOptions } from './tools/tool-facade.js';
export { ToolCatalog } from './tools/tool-catalog.js';
export type { BoundTool } from './tools/tool-catalog.js';
export { looksLikeFailure, FAILURE_TOKENS } from './tools/failure-heuristic.js';
export { renderToolResult } from './tools/types.js';
export type { ToolCall, ToolResult, ToolEvent } from './tools/types.js';

// Control loop
export { AgentLoop, normalizeToolCalls } from './orchestrator/agent-loop.js';
export type { AgentLoopOptions, LoopPolicy, ToolSource } from './orchestrator/agent-loop.js';
export { SessionManager } from './orchestrator/session-manager.js';
export type { SessionManagerOptions, ActiveSession } from './orchestrator/session-manager.js';
export { EventSink } from './orchestrator/event-sink.js';
export { judgeDecision, looksLikeDocument } from './orchestrator/termination.js';
export type { TerminationPolicy, Verdict } from './orchestrator/termination.js';
export { ABORT_MARKER } from './orchestrator/types.js';
export type {
  TranscriptTurn,
  Transcript,
  TerminalState,
  LoopOutcome,
  LoopEvent,
  SessionEvent,
} from './orchestrator/types.js';

// Decisions
export { OpenAIDecisionMaker, resolveApiKey } from './decision/openai-decision-maker.js';
export type { OpenAIDecisionOptions } from './decision/openai-decision-maker.js';
export type { Decision, DecisionRequest, DecisionMaker } from './decision/types.js';

// Configuration and logging
export { loadUserConfig, resetConfigCache, DEFAULT_CONFIG } from './config/user-config.js';
export type { UserConfig } from './config/user-config.js';
export { findPeersFile, loadPeersConfig } from './config/peers-config.js';
export { initLog, closeLog, flog } from './utils/log.js';
