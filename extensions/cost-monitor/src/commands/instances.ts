import { checkInstanceCosts, renderInstanceCosts } from "../instance-costs.js";
import { targetInstances, type CommandContext } from "./context.js";

export async function instancesCommand(ctx: CommandContext, name?: string): Promise<number> {
  const report = await checkInstanceCosts(targetInstances(ctx, name), {
    inventory: ctx.inventory,
    rates: ctx.rates,
    dailyThreshold: ctx.config.thresholds.dailyCost,
  });
  ctx.runtime.log(renderInstanceCosts(report, ctx.config.projectId, ctx.now().getTime()));
  return 0;
}
