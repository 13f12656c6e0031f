import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { CopyError, FileCopier } from "./FileCopier";
import type { MatchPlan } from "./ImageMatchService";
import type { EmitOptions, EmitSummary, MatchEmitter } from "./MatchEmitter";

export class MatchEmitterDefault implements MatchEmitter {
  private readonly copier: FileCopier;
  private readonly logger: Logger;

  constructor(deps: { copier: FileCopier; logger: Logger }) {
    this.copier = deps.copier;
    this.logger = deps.logger;
  }

  async emit(
    plan: MatchPlan,
    destination: string,
    options?: EmitOptions
  ): Promise<Result<EmitSummary, CopyError>> {
    const dryRun = options?.dryRun ?? false;
    const summary: EmitSummary = { matched: 0, skipped: 0, copied: 0 };

    for (const outcome of plan.outcomes) {
      if (outcome.type === "NO_IDENTIFIER") {
        const fileName = path.basename(outcome.sourcePath);
        this.logger.info({
          event: "no-identifier",
          emoji: "🚫",
        })`無法從 ${fileName} 取得識別碼`;
        summary.skipped++;
        continue;
      }

      if (outcome.type === "NO_MATCH") {
        this.logger.info({
          event: "no-match",
          emoji: "🔍",
          missingIn: outcome.missingIn,
        })`找不到識別碼 ${outcome.identifier} 的配對`;
        summary.skipped++;
        continue;
      }

      const { group } = outcome;
      if (outcome.ambiguous) {
        this.logger.info({
          event: "multiple-matches",
          emoji: "🔀",
          ...outcome.candidateCounts,
        })`識別碼 ${group.identifier} 有多筆配對，各資料夾使用第一筆`;
      }

      for (const file of group.files) {
        const to = path.join(destination, file.to);
        if (dryRun) {
          this.logger.info({
            event: "would-copy",
            emoji: "📝",
          })`${file.from} → ${to}`;
          continue;
        }
        const copyRes = await this.copier.copy(file.from, to);
        if (isErr(copyRes)) return err(copyRes.error);
        summary.copied++;
        this.logger.debug({ event: "copied" })`${file.from} → ${to}`;
      }

      summary.matched++;
      const matchedLog = this.logger.info({
        event: "matched",
        emoji: "📦",
        index: group.index,
      });
      if (dryRun) matchedLog`已配對識別碼 ${group.identifier}（試跑，未複製）`;
      else matchedLog`已配對並複製識別碼 ${group.identifier} 的檔案`;
    }

    this.logger.info({
      event: "done",
      emoji: "✅",
      ...summary,
    })`共找到並處理 ${summary.matched} 組配對`;
    return ok(summary);
  }
}
