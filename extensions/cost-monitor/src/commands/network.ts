import { renderNetworkUsage } from "../network-usage.js";
import { collectProjectNetworkUsage, targetInstances, type CommandContext } from "./context.js";

export async function networkCommand(ctx: CommandContext, name?: string): Promise<number> {
  const report = await collectProjectNetworkUsage(ctx, targetInstances(ctx, name));
  ctx.runtime.log(
    renderNetworkUsage(report, {
      projectId: ctx.config.projectId,
      thresholdGb: ctx.config.thresholds.networkGb,
      now: ctx.now(),
    }),
  );
  return 0;
}
