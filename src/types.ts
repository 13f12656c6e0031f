export type CopyFile = { from: string; to: string };

/** 1: 來源, 2: folder1, 3: folder2 */
export type MatchSlot = 1 | 2 | 3;

export type MatchFile = CopyFile & { slot: MatchSlot };

export type CandidateFolder = "folder1" | "folder2";
