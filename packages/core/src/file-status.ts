import { InvalidTransitionError } from "@docboard/errors";
import type { FileProcessingStatus } from "@docboard/types";

const TRANSITIONS: Record<FileProcessingStatus, readonly FileProcessingStatus[]> = {
  pending: ["processing"],
  processing: ["completed", "failed"],
  completed: [],
  // reupload
  failed: ["processing"],
};

/** Operator corrections outside the normal flow: a completed file found missing from storage. */
const ADMINISTRATIVE: Partial<Record<FileProcessingStatus, readonly FileProcessingStatus[]>> = {
  completed: ["failed"],
};

export function canTransition(
  from: FileProcessingStatus,
  to: FileProcessingStatus,
  options: { administrative?: boolean } = {},
): boolean {
  if (TRANSITIONS[from].includes(to)) return true;
  return options.administrative === true && (ADMINISTRATIVE[from]?.includes(to) ?? false);
}

export function assertTransition(
  from: FileProcessingStatus,
  to: FileProcessingStatus,
  options: { administrative?: boolean } = {},
): void {
  if (!canTransition(from, to, options)) throw new InvalidTransitionError(from, to);
}
