import path from "node:path";

import { indexPadWidth } from "@/constants";
import type { CandidateFolder, MatchFile, MatchSlot } from "@/types";
import { byCodePoint } from "@/utils/helper";

import { extractIdentifier } from "./ImageIdentifier";
import type {
  ImageMatchService,
  MatchInput,
  MatchOutcome,
  MatchPlan,
} from "./ImageMatchService";

/**
 * `{index:04d}_{slot}_{group}_{原檔名}`，序號超過 4 位數時照常變寬。
 */
export function buildTargetName(
  index: number,
  slot: MatchSlot,
  groupName: string,
  filePath: string
) {
  const serial = String(index).padStart(indexPadWidth, "0");
  return `${serial}_${slot}_${groupName}_${path.basename(filePath)}`;
}

/**
 * 資料夾的群組名：解析為絕對路徑後的最後一段，`.` 與結尾斜線皆取實際名稱。
 * 來源用來源資料夾，候選檔用其所在資料夾。
 */
export function groupNameOf(dirPath: string) {
  return path.basename(path.resolve(dirPath));
}

export class ImageMatchServiceDefault implements ImageMatchService {
  plan(input: MatchInput): MatchPlan {
    const sourceName = groupNameOf(input.sourceFolder);
    const sorted = [...input.sourcePaths].sort((a, b) =>
      byCodePoint(path.basename(a), path.basename(b))
    );

    const outcomes = sorted.map((sourcePath, index): MatchOutcome => {
      const identifier = extractIdentifier(path.basename(sourcePath));
      if (identifier === null) {
        return { type: "NO_IDENTIFIER", index, sourcePath };
      }

      const list1 = input.folder1.get(identifier) ?? [];
      const list2 = input.folder2.get(identifier) ?? [];
      const [first1] = list1;
      const [first2] = list2;
      if (first1 === undefined || first2 === undefined) {
        const missingIn: CandidateFolder[] = [];
        if (first1 === undefined) missingIn.push("folder1");
        if (first2 === undefined) missingIn.push("folder2");
        return { type: "NO_MATCH", index, sourcePath, identifier, missingIn };
      }

      const file = (
        slot: MatchSlot,
        from: string,
        group: string
      ): MatchFile => ({
        slot,
        from,
        to: buildTargetName(index, slot, group, from),
      });

      return {
        type: "MATCHED",
        sourcePath,
        group: {
          index,
          identifier,
          files: [
            file(1, sourcePath, sourceName),
            file(2, first1, groupNameOf(path.dirname(first1))),
            file(3, first2, groupNameOf(path.dirname(first2))),
          ],
        },
        ambiguous: list1.length > 1 || list2.length > 1,
        candidateCounts: { folder1: list1.length, folder2: list2.length },
      };
    });

    return { outcomes };
  }
}
