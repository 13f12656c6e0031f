import type { Result } from "~shared/utils/Result";

import type { CopyError } from "./FileCopier";
import type { MatchPlan } from "./ImageMatchService";

export type EmitOptions = {
  /** 只輸出將複製的檔案，不寫入目的地 */
  dryRun?: boolean;
};

export type EmitSummary = {
  /** 成功的配對組數 */
  matched: number;
  /** 無識別碼或無配對而略過的來源檔 */
  skipped: number;
  /** 實際複製的檔案數 */
  copied: number;
};

export interface MatchEmitter {
  /**
   * 依序處理配對結果並把每組三個檔案複製到 destination。
   * 任一檔案複製失敗即停止，已複製的檔案不會還原。
   */
  emit(
    plan: MatchPlan,
    destination: string,
    options?: EmitOptions
  ): Promise<Result<EmitSummary, CopyError>>;
}
