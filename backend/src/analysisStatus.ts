import type { AnalysisStatus } from "./types.js";

const TRANSITIONS: Record<AnalysisStatus, readonly AnalysisStatus[]> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export const canTransition = (from: AnalysisStatus, to: AnalysisStatus): boolean =>
  TRANSITIONS[from].includes(to);

export const isTerminalStatus = (status: AnalysisStatus): boolean => TRANSITIONS[status].length === 0;
