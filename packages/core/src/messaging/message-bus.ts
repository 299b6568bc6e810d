/** Resolving acknowledges the message; the transport holds back until then. */
export type MessageHandler = (payload: Uint8Array) => Promise<void>;

export interface MessagePublisher {
  publish(topic: string, payload: string): Promise<void>;
}

export interface MessageBus extends MessagePublisher {
  subscribe(topic: string, handler: MessageHandler): Promise<void>;
  /** Begins delivery to every handler registered so far. */
  start(): Promise<void>;
  close(): Promise<void>;
}
