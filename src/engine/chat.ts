import { record, tell } from "./context";
import type { GameContext } from "./context";
import { GameRuleError } from "./types";
import type { Player } from "./types";
import { getPlayer } from "./utils";

export const MAX_MESSAGE_LENGTH = 500;

/**
 * Checks a private message before anything is delivered.
 * Throws a GameRuleError (and so triggers a retry) on the first problem found.
 */
export function resolveRecipients(ctx: GameContext, sender: Player, recipients: string[], text: string): Player[] {
  if (sender.messagesLeft <= 0) {
    throw new GameRuleError("NO_MESSAGES_LEFT", "You have no messages left today");
  }
  if (recipients.length === 0) {
    throw new GameRuleError("NO_RECIPIENTS", "Name at least one recipient");
  }
  if (new Set(recipients).size !== recipients.length) {
    throw new GameRuleError("DUPLICATE_RECIPIENT", "Each recipient may only be named once");
  }
  const body = text.trim();
  if (body.length === 0 || body.length > MAX_MESSAGE_LENGTH) {
    throw new GameRuleError("BAD_TEXT", `Messages must be 1-${MAX_MESSAGE_LENGTH} characters`);
  }

  return recipients.map(name => {
    const player = getPlayer(ctx.state.players, name);
    if (!player) {
      throw new GameRuleError("PLAYER_NOT_FOUND", `Player ${name} not found`);
    }
    if (player === sender) {
      throw new GameRuleError("INVALID_RECIPIENT", "You cannot message yourself");
    }
    return player;
  });
}

/** Delivers a validated message to every recipient and spends one of the sender's daily messages. */
export function sendMessage(ctx: GameContext, sender: Player, recipients: Player[], text: string): void {
  const names = recipients.map(p => p.name).join(", ");
  const body = text.trim();
  sender.messagesLeft -= 1;
  for (const recipient of recipients) {
    tell(ctx, recipient, `Message from ${sender.name} to ${names}: ${body}`);
  }
  record(ctx, {
    kind: "MESSAGE",
    description: `${sender.name} → ${names}: ${body}`,
    participants: [sender.name, ...recipients.map(p => p.name)],
    metadata: { text: body },
    visibility: "PRIVATE"
  });
}
