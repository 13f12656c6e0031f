import path from "node:path";
import { describe, expect, test } from "vitest";

import type { CandidateIndex } from "@/services/CandidateIndexer";
import {
  ImageMatchServiceDefault,
  buildTargetName,
  groupNameOf,
} from "@/services/ImageMatchServiceDefault";

function index(entries: Record<string, string[]>): CandidateIndex {
  return new Map(Object.entries(entries));
}

describe("buildTargetName", () => {
  test("序號補零到 4 位", () => {
    expect(buildTargetName(7, 1, "source", "/a/b.jpg")).toBe(
      "0007_1_source_b.jpg"
    );
  });

  test("序號超過 4 位數時照常變寬", () => {
    expect(buildTargetName(12345, 2, "g", "/x/y.jpg")).toBe(
      "12345_2_g_y.jpg"
    );
  });
});

describe("groupNameOf", () => {
  test("取解析後路徑的最後一段", () => {
    expect(groupNameOf("/data/f1/")).toBe("f1");
    expect(groupNameOf(".")).toBe(path.basename(process.cwd()));
  });
});

describe("ImageMatchServiceDefault", () => {
  const folder1 = index({
    "000": ["/data/f1/day1/p_00099999.jpg"],
  });
  const folder2 = index({
    "000": ["/data/f2/q_00011111.jpg"],
  });

  test("三處都有相同識別碼時產生一組配對", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: "/data/source",
      sourcePaths: ["/data/source/img00012345.jpg"],
      folder1,
      folder2,
    });

    expect(plan.outcomes).toEqual([
      {
        type: "MATCHED",
        sourcePath: "/data/source/img00012345.jpg",
        ambiguous: false,
        candidateCounts: { folder1: 1, folder2: 1 },
        group: {
          index: 0,
          identifier: "000",
          files: [
            {
              slot: 1,
              from: "/data/source/img00012345.jpg",
              to: "0000_1_source_img00012345.jpg",
            },
            {
              slot: 2,
              from: "/data/f1/day1/p_00099999.jpg",
              to: "0000_2_day1_p_00099999.jpg",
            },
            {
              slot: 3,
              from: "/data/f2/q_00011111.jpg",
              to: "0000_3_f2_q_00011111.jpg",
            },
          ],
        },
      },
    ]);
  });

  test("序號依來源檔名排序，而非輸入順序", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: "/data/source",
      sourcePaths: [
        "/data/source/b_00010001.jpg",
        "/data/source/a_00020002.jpg",
      ],
      folder1,
      folder2,
    });

    const groups = plan.outcomes.map((o) =>
      o.type === "MATCHED" ? [o.group.index, o.sourcePath] : null
    );
    expect(groups).toEqual([
      [0, "/data/source/a_00020002.jpg"],
      [1, "/data/source/b_00010001.jpg"],
    ]);
  });

  test("只有一個候選資料夾有識別碼時不配對", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: "/data/source",
      sourcePaths: ["/data/source/img00012345.jpg"],
      folder1,
      folder2: index({}),
    });

    expect(plan.outcomes).toEqual([
      {
        type: "NO_MATCH",
        index: 0,
        sourcePath: "/data/source/img00012345.jpg",
        identifier: "000",
        missingIn: ["folder2"],
      },
    ]);
  });

  test("兩個候選資料夾都沒有時列出兩者", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: "/data/source",
      sourcePaths: ["/data/source/img12300000.jpg"],
      folder1,
      folder2,
    });

    const [outcome] = plan.outcomes;
    expect(outcome.type).toBe("NO_MATCH");
    if (outcome.type === "NO_MATCH") {
      expect(outcome.identifier).toBe("123");
      expect(outcome.missingIn).toEqual(["folder1", "folder2"]);
    }
  });

  test("取不到識別碼的來源檔仍佔用序號", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: "/data/source",
      sourcePaths: [
        "/data/source/photo_final.jpg",
        "/data/source/IMG00012345.JPG",
        "/data/source/img00012345.jpg",
      ],
      folder1,
      folder2,
    });

    // 依 code point 排序：大寫在小寫之前
    expect(plan.outcomes.map((o) => o.type)).toEqual([
      "NO_IDENTIFIER",
      "MATCHED",
      "NO_IDENTIFIER",
    ]);
    const matched = plan.outcomes[1];
    expect(matched.type === "MATCHED" && matched.group.files[0].to).toBe(
      "0001_1_source_img00012345.jpg"
    );
  });

  test("多筆候選時各取第一筆並標記 ambiguous", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: "/data/source",
      sourcePaths: ["/data/source/img00012345.jpg"],
      folder1: index({
        "000": ["/data/f1/a/first_00000001.jpg", "/data/f1/b/second_00000002.jpg"],
      }),
      folder2,
    });

    const [outcome] = plan.outcomes;
    expect(outcome.type).toBe("MATCHED");
    if (outcome.type === "MATCHED") {
      expect(outcome.ambiguous).toBe(true);
      expect(outcome.candidateCounts).toEqual({ folder1: 2, folder2: 1 });
      expect(outcome.group.files[1]).toEqual({
        slot: 2,
        from: "/data/f1/a/first_00000001.jpg",
        to: "0000_2_a_first_00000001.jpg",
      });
    }
  });

  test("5 碼以內的數字直接作為識別碼", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: "/data/source/",
      sourcePaths: ["/data/source/42.jpg"],
      folder1: index({ "42": ["/data/f1/x42.jpg"] }),
      folder2: index({ "42": ["/data/f2/y42.jpg"] }),
    });

    const [outcome] = plan.outcomes;
    expect(outcome.type === "MATCHED" && outcome.group.files.map((f) => f.to)).toEqual([
      "0000_1_source_42.jpg",
      "0000_2_f1_x42.jpg",
      "0000_3_f2_y42.jpg",
    ]);
  });

  test("來源與候選檔都以實際資料夾名稱作為群組名", () => {
    const svc = new ImageMatchServiceDefault();
    const plan = svc.plan({
      sourceFolder: ".",
      sourcePaths: ["img00012345.jpg"],
      folder1: index({ "000": ["x_00000001.jpg"] }),
      folder2: index({ "000": ["./y_00000002.jpg"] }),
    });

    const cwdName = path.basename(process.cwd());
    const [outcome] = plan.outcomes;
    expect(
      outcome.type === "MATCHED" && outcome.group.files.map((f) => f.to)
    ).toEqual([
      `0000_1_${cwdName}_img00012345.jpg`,
      `0000_2_${cwdName}_x_00000001.jpg`,
      `0000_3_${cwdName}_y_00000002.jpg`,
    ]);
  });
});
