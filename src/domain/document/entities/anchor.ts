export type AnchorBias = "left" | "right";

/**
 * A position captured at a given buffer version. Resolving it against a later
 * version maps it through every edit in between, so it keeps pointing at the
 * same logical place while the text around it changes.
 *
 * A right-biased anchor moves past text inserted exactly at its offset; a
 * left-biased one stays in front of it.
 */
export interface Anchor {
  readonly bufferId: string;
  readonly version: number;
  readonly offset: number;
  readonly bias: AnchorBias;
}

/** One replaced range of a version, in the coordinates of the version before it. */
export interface EditPatch {
  oldStart: number;
  oldEnd: number;
  newLength: number;
}

/**
 * Maps an offset through a batch of patches sorted by `oldStart` and
 * non-overlapping. Edits strictly before the offset shift it; edits after it
 * leave it untouched; an offset inside a replaced range collapses to the
 * start (left) or the end (right) of the replacement.
 */
export function transformOffset(
  offset: number,
  bias: AnchorBias,
  patches: readonly EditPatch[],
): number {
  let delta = 0;

  for (const patch of patches) {
    if (offset < patch.oldStart) {
      break;
    }

    const oldLength = patch.oldEnd - patch.oldStart;
    if (offset === patch.oldStart && (oldLength > 0 || bias === "left")) {
      break;
    }

    if (offset < patch.oldEnd) {
      return patch.oldStart + delta + (bias === "right" ? patch.newLength : 0);
    }

    delta += patch.newLength - oldLength;
  }

  return offset + delta;
}
