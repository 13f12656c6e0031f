import type { Result } from "~shared/utils/Result";

export type CopyError = {
  type: "COPY_FAILED";
  from: string;
  to: string;
  message: string;
};

export interface FileCopier {
  /** 複製內容、權限與存取/修改時間，目標存在時覆蓋 */
  copy(from: string, to: string): Promise<Result<null, CopyError>>;
}
