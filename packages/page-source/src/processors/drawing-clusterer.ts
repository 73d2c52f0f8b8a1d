import type { DrawingCluster } from '@ledgerlens/model';

import type { DrawingPath } from './operator-list-parser';

import { bboxUnion, bboxesTouch } from '@ledgerlens/shared';

export interface DrawingClusterOptions {
  /**
   * Paths within this many points of a cluster join it (default: 10)
   */
  gap?: number;

  /**
   * Pages with fewer painted paths than this have no clusters (default: 5)
   */
  minPaths?: number;
}

/**
 * Greedily merge painted paths into clusters.
 *
 * Each path joins the first cluster it touches (within `gap`), otherwise it
 * starts a new one. Clusters are not re-merged with each other afterwards, so
 * the result depends on path order; callers decide which clusters qualify as
 * figures.
 */
export function clusterDrawingPaths(
  paths: readonly DrawingPath[],
  options: DrawingClusterOptions = {},
): DrawingCluster[] {
  const gap = options.gap ?? 10;
  const minPaths = options.minPaths ?? 5;

  if (paths.length < minPaths) {
    return [];
  }

  const clusters: DrawingCluster[] = [];
  for (const path of paths) {
    const target = clusters.find((cluster) =>
      bboxesTouch(path.bbox, cluster.bbox, gap),
    );
    if (target) {
      target.bbox = bboxUnion(target.bbox, path.bbox);
      target.pathCount += 1;
      target.hasFill ||= path.hasFill;
      target.hasStroke ||= path.hasStroke;
    } else {
      clusters.push({
        bbox: [...path.bbox],
        pathCount: 1,
        hasFill: path.hasFill,
        hasStroke: path.hasStroke,
      });
    }
  }
  return clusters;
}
