import { z } from "zod";

export const PING_TYPE = 0;

export const APPLICATION_AUTHORIZED = "APPLICATION_AUTHORIZED";
export const APPLICATION_DEAUTHORIZED = "APPLICATION_DEAUTHORIZED";

export type ChannelType = "discord";

export const webhookUserSchema = z.object({
  id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()),
  username: z.string().optional(),
  global_name: z.string().nullish()
});

export const webhookUserEventSchema = z.object({
  event: z.object({
    data: z.object({
      user: webhookUserSchema
    })
  })
});

export interface WebhookEvent {
  numericType: number | null;
  eventType: string;
  payload: Record<string, unknown>;
}

export interface ExternalUser {
  externalId: string;
  displayName: string;
  channelType: ChannelType;
}

export type MessageButton = {
  type: 2;
  style: 1 | 2;
  label: string;
  custom_id: string;
};

export type ActionRow = {
  type: 1;
  components: MessageButton[];
};
