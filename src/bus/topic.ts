/** Where the ingress filter sends encoded events. */
export interface Topic {
  /** Resolves with the message id assigned by the backend. */
  publish(data: Buffer): Promise<string>;
}

export interface TopicMessage {
  id: string;
  data: Buffer;
}
