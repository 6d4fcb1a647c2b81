import type { LoopHandle } from "../runtime/eventLoop";
import type { ActionRow } from "./discord";

export interface UserHandle {
  readonly id: string;
  send(text: string, components?: ActionRow[]): Promise<void>;
}

/** What the webhook side is allowed to know about the running bot. */
export interface BotHandle {
  readonly loop: LoopHandle | null;
  fetchUser(userId: string): Promise<UserHandle | null>;
}

/** Optional lookup into the user-data layer for already linked accounts. */
export interface AccountDirectory {
  findLinkedAccount(externalId: string, channelType: string): Promise<string | null>;
}
