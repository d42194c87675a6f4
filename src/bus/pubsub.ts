import { PubSub, type Topic as PubSubClientTopic } from "@google-cloud/pubsub";
import type { Topic } from "./topic.js";

export class PubSubTopic implements Topic {
  private readonly topic: PubSubClientTopic;

  constructor(projectId: string, topicId: string, client: PubSub = new PubSub({ projectId })) {
    if (!topicId) throw new Error("Pub/Sub topic id is not configured. Set TOPIC_ID.");
    this.topic = client.topic(topicId);
  }

  async publish(data: Buffer): Promise<string> {
    return this.topic.publishMessage({ data });
  }
}
