import type { BranchPath, BranchSegment } from '../contracts/context';

export const ROOT_BRANCH: BranchPath = Object.freeze([]);

/**
 * Renders a branch path as `split[index/width]` segments joined by `/`,
 * e.g. `start[1/2]/cross_validation[3/5]`. The root path renders as `''`.
 */
export function formatBranchPath(path: BranchPath): string {
    return path.map((segment) => `${segment.split}[${segment.index}/${segment.width}]`).join('/');
}

export function extendBranchPath(path: BranchPath, segment: BranchSegment): BranchPath {
    return Object.freeze([...path, Object.freeze({ ...segment })]);
}

