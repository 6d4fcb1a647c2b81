import type { ActionRow } from "../types/discord";

export const CREATE_ACCOUNT_PREFIX = "welcome_create_account";
export const LINK_ACCOUNT_PREFIX = "welcome_link_account";

type WelcomeMessageOptions = {
  /** The user just connected the app, as opposed to a first conversation. */
  isAuthorization?: boolean;
};

export function buildWelcomeMessage(displayName: string, options: WelcomeMessageOptions = {}): string {
  const name = displayName.trim();
  const greeting = name ? `Hi ${name}, welcome aboard!` : "Hi, welcome aboard!";
  const intro = options.isAuthorization
    ? "Thanks for connecting the assistant. It can send you check-ins, reminders and task nudges right here in your DMs."
    : "The assistant can send you check-ins, reminders and task nudges right here in your DMs.";

  return [
    `👋 ${greeting}`,
    "",
    intro,
    "",
    "To get started, create a new account or link one you already have using the buttons below."
  ].join("\n");
}

export function buildWelcomeComponents(externalId: string): ActionRow[] {
  return [
    {
      type: 1,
      components: [
        {
          type: 2,
          style: 1,
          label: "Create Account",
          custom_id: `${CREATE_ACCOUNT_PREFIX}:${externalId}`
        },
        {
          type: 2,
          style: 2,
          label: "Link Account",
          custom_id: `${LINK_ACCOUNT_PREFIX}:${externalId}`
        }
      ]
    }
  ];
}
