export interface RouteOptimizationResult {
  status: 'success' | 'error';
  optimizedRoute: string[];
  distanceKm: number;
}

export interface OptimalPath {
  order: number[];
  cost: number;
}

/**
 * Shortest open path over `matrix` that starts at `start` and visits every
 * node exactly once (Held–Karp, O(2^n · n^2)). Unreachable pairs are
 * `Infinity`; when every ordering crosses one, `cost` is `Infinity`.
 */
export function heldKarp(matrix: number[][], start = 0): OptimalPath {
  const n = matrix.length;
  if (n === 0) {
    return { order: [], cost: 0 };
  }
  if (n === 1) {
    return { order: [start], cost: 0 };
  }

  const full = (1 << n) - 1;
  // cost[mask][last]: cheapest path from start covering `mask`, ending at `last`
  const cost: number[][] = Array.from({ length: 1 << n }, () => new Array<number>(n).fill(Infinity));
  const parent: number[][] = Array.from({ length: 1 << n }, () => new Array<number>(n).fill(-1));
  cost[1 << start][start] = 0;

  for (let mask = 0; mask <= full; mask++) {
    if ((mask & (1 << start)) === 0) continue;

    for (let last = 0; last < n; last++) {
      const current = cost[mask][last];
      if ((mask & (1 << last)) === 0 || current === Infinity) continue;

      for (let next = 0; next < n; next++) {
        if (mask & (1 << next)) continue;

        const nextMask = mask | (1 << next);
        const candidate = current + matrix[last][next];
        if (candidate < cost[nextMask][next]) {
          cost[nextMask][next] = candidate;
          parent[nextMask][next] = last;
        }
      }
    }
  }

  let best = Infinity;
  let end = -1;
  for (let last = 0; last < n; last++) {
    if (last !== start && cost[full][last] < best) {
      best = cost[full][last];
      end = last;
    }
  }

  if (end === -1) {
    return { order: [], cost: Infinity };
  }

  const order: number[] = [];
  let mask = full;
  let node = end;
  while (node !== -1) {
    order.push(node);
    const previous = parent[mask][node];
    mask ^= 1 << node;
    node = previous;
  }

  return { order: order.reverse(), cost: best };
}

export type DistanceMatrixSource = (addresses: string[]) => Promise<number[][]>;

/**
 * Order the stops to minimise driving distance, keeping the first address as
 * the starting point. Distances come back in meters from `source`.
 */
export async function optimizeRoute(
  addresses: string[],
  source: DistanceMatrixSource
): Promise<RouteOptimizationResult> {
  if (addresses.length <= 1) {
    return { status: 'success', optimizedRoute: [...addresses], distanceKm: 0 };
  }

  try {
    const matrix = await source(addresses);
    const { order, cost } = heldKarp(matrix);

    if (!Number.isFinite(cost)) {
      return { status: 'error', optimizedRoute: [...addresses], distanceKm: 0 };
    }

    return {
      status: 'success',
      optimizedRoute: order.map((index) => addresses[index]),
      distanceKm: cost / 1000,
    };
  } catch (error) {
    console.error('Route optimization failed:', error instanceof Error ? error.message : error);
    return { status: 'error', optimizedRoute: [...addresses], distanceKm: 0 };
  }
}
