import { ensureDelivered } from "../slack.js";
import { requireNotifier, type CommandContext } from "./context.js";

/** Post an ad-hoc message, e.g. `notify "Deploy finished" "#ff9500" "Warning"`. */
export async function notifyCommand(
  ctx: Pick<CommandContext, "notifier" | "runtime">,
  message: string,
  color?: string,
  title?: string,
): Promise<number> {
  const notifier = requireNotifier(ctx);
  ensureDelivered(await notifier.sendMessage(message, { color, title }), "message");
  ctx.runtime.log("Message sent");
  return 0;
}
