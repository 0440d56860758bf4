import type { Redis } from "ioredis";
import type { StatusTransition } from "../types.js";

export const TRANSITIONS_CHANNEL = "netpulse:transitions";

/** Fan-out of status transitions to other processes. */
export interface TransitionPublisher {
  publish(transition: StatusTransition): Promise<void>;
}

/** Publishes each transition as JSON on a Redis pub/sub channel. */
export class RedisTransitionPublisher implements TransitionPublisher {
  constructor(
    private readonly redis: Pick<Redis, "publish">,
    private readonly channel: string = TRANSITIONS_CHANNEL,
  ) {}

  async publish(transition: StatusTransition): Promise<void> {
    await this.redis.publish(this.channel, JSON.stringify(transition));
  }
}
