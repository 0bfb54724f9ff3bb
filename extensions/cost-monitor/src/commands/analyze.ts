import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

import { analysisLogPath } from "../../../../src/config/paths.js";
import { renderAnalysisLog, renderCostAnalysis } from "../analysis.js";
import { runProjectAnalysis, type CommandContext } from "./context.js";

/** Print the daily cost analysis and keep a short copy under `logs/`. */
export async function analyzeCommand(ctx: CommandContext): Promise<number> {
  const analysis = await runProjectAnalysis(ctx);
  ctx.runtime.log(renderCostAnalysis(analysis));

  const logPath = analysisLogPath(ctx.paths, analysis.generatedAt);
  await mkdir(dirname(logPath), { recursive: true });
  await writeFile(logPath, renderAnalysisLog(analysis), "utf8");
  ctx.runtime.log("");
  ctx.runtime.log(`Report saved to: ${logPath}`);
  return 0;
}
