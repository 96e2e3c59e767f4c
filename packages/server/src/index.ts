export * from './types.js';
export * from './errors.js';
export { loadEnvironment, loadServerConfig, type ServerConfig } from './config.js';
export { DebugLogger } from './debug/DebugLogger.js';
export { ByteReader } from './service/byte-reader.js';
export { decodeMessage, encodeMessage } from './service/framer.js';
export {
  isFileUri,
  parseClientMessage,
  validateMessage,
} from './service/message-validation.js';
export { extractDocumentText, MirrorFile } from './service/mirror-file.js';
export {
  AnalysisProcessManager,
  type AnalysisProcess,
  type AnalysisProcessOptions,
  type ProcessSpawner,
} from './service/process-manager.js';
export {
  CloseCode,
  SessionBridge,
  type SessionConnection,
  type SessionState,
} from './service/session-bridge.js';
export { DocRoom, type RoomConnection, type RoomPeer } from './rooms/doc-room.js';
export { RoomRegistry } from './rooms/room-registry.js';
export {
  FileUpdateStore,
  type UpdateStore,
  type UpdateStoreFactory,
} from './rooms/update-store.js';
export {
  createProofpadServer,
  matchConnectionRoute,
  ProofpadServer,
  type ConnectionRoute,
} from './server.js';
