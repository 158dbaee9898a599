import {
  ROOT_BRANCH,
  extendBranchPath,
  type Artifacts,
  type BranchPath,
  type BranchResult,
  type BranchSegment
} from '@forkline/core';

import { ArtifactMap } from '../artifacts/map';

/** Producer recorded for artifacts returned by a run's `initialize` hook. */
export const INITIALIZE_STEP = '<initialize>';

/**
 * Execution state of one path through the graph: the sequential path of a
 * run, or one branch of a parallel region.
 */
export interface BranchState {
  readonly branch: BranchPath;
  /** Element of the innermost enclosing foreach. */
  readonly input: unknown;
  readonly artifacts: ArtifactMap;
  readonly signal: AbortSignal;
}

export function createRootBranch(signal: AbortSignal, initial: Artifacts = {}): BranchState {
  return {
    branch: ROOT_BRANCH,
    input: undefined,
    artifacts: ArtifactMap.empty().publish(INITIALIZE_STEP, initial),
    signal
  };
}

/** A child branch sees the parent's artifacts as of the fork. */
export function forkBranch(parent: BranchState, segment: BranchSegment, input: unknown, signal: AbortSignal): BranchState {
  return {
    branch: extendBranchPath(parent.branch, segment),
    input,
    artifacts: parent.artifacts,
    signal
  };
}

export function publishArtifacts(state: BranchState, step: string, artifacts: Artifacts): BranchState {
  return { ...state, artifacts: state.artifacts.publish(step, artifacts) };
}

export function toBranchResult(state: BranchState): BranchResult {
  const segment = state.branch[state.branch.length - 1];
  return Object.freeze({
    branch: state.branch,
    index: segment ? segment.index : 0,
    input: state.input,
    artifacts: state.artifacts
  });
}
