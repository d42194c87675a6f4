import { AsyncQueue } from "./async-queue.js";
import type { Topic, TopicMessage } from "./topic.js";

/** In-process topic for the single-process gateway. */
export class MessageBus implements Topic {
  private readonly messages = new AsyncQueue<TopicMessage>();
  private seq = 0;

  async publish(data: Buffer): Promise<string> {
    const id = `local-${++this.seq}`;
    this.messages.push({ id, data });
    return id;
  }

  async consume(): Promise<TopicMessage | null> {
    return this.messages.pop();
  }

  close(): void {
    this.messages.close();
  }

  get size(): number {
    return this.messages.size();
  }
}
