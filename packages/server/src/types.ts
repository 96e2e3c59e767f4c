export type SessionId = string;

export type RoomName = string;

/**
 * Method names the bridge knows about. Anything else is still forwarded; the
 * enumeration only names the methods that need special handling or that show
 * up in logs often enough to be worth naming.
 */
export const ProtocolMethod = {
  Initialize: 'initialize',
  Initialized: 'initialized',
  Shutdown: 'shutdown',
  Exit: 'exit',
  DidOpen: 'textDocument/didOpen',
  DidChange: 'textDocument/didChange',
  DidClose: 'textDocument/didClose',
  Hover: 'textDocument/hover',
  Completion: 'textDocument/completion',
  PublishDiagnostics: 'textDocument/publishDiagnostics',
  PlainGoal: '$/lean/plainGoal',
  PlainTermGoal: '$/lean/plainTermGoal',
} as const;

export type ProtocolMethod =
  (typeof ProtocolMethod)[keyof typeof ProtocolMethod];

export type ProtocolParams = Record<string, unknown>;

export type JsonRpcId = string | number | null;

/**
 * One JSON-RPC style message as exchanged with the client and the analysis
 * process. The parameter bag stays open because its shape depends on the
 * method.
 */
export interface ProtocolMessage {
  jsonrpc?: string;
  id?: JsonRpcId;
  method?: string;
  params?: ProtocolParams | unknown[];
  result?: unknown;
  error?: unknown;
  [field: string]: unknown;
}

export interface DocumentMetadata {
  fileUri: string;
  rootUri: string;
}

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const isProtocolMessage = (value: unknown): value is ProtocolMessage => {
  if (!isRecord(value)) {
    return false;
  }
  if (value.method !== undefined && typeof value.method !== 'string') {
    return false;
  }
  if (
    value.id !== undefined &&
    value.id !== null &&
    typeof value.id !== 'string' &&
    typeof value.id !== 'number'
  ) {
    return false;
  }
  if (
    value.params !== undefined &&
    !isRecord(value.params) &&
    !Array.isArray(value.params)
  ) {
    return false;
  }
  return true;
};
