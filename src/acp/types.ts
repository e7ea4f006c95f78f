export type Direction = 'editor_to_agent' | 'agent_to_editor'

/** JSON-RPC id as sent on the wire; echoed verbatim by the peer. */
export type RequestId = unknown

export interface RequestMessage {
    type: 'request'
    id: RequestId
    method: string
    params: unknown
}

export interface ResponseMessage {
    type: 'response'
    id: RequestId
    result?: unknown
    error?: unknown
}

export interface NotificationMessage {
    type: 'notification'
    method: string
    params: unknown
}

export type AcpMessage = RequestMessage | ResponseMessage | NotificationMessage

export interface PeerInfo {
    name: string
    version?: string
}

export type ToolType = 'datastore' | 'extension'

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'cancelled' | 'other'
