/**
 * Shortest Paths Example
 *
 * Dijkstra's algorithm on a small road map, using IndexedHeap.enqueueOrUpdate
 * as decrease-key.
 * Run with: npx tsx examples/shortest-paths.ts
 */

import { IndexedHeap } from "@prioset/sdk";

type Graph = Record<string, Record<string, number>>;

const roads: Graph = {
  Harbor: { Market: 4, Mill: 1 },
  Mill: { Market: 2, Bridge: 5 },
  Market: { Bridge: 1, Castle: 7 },
  Bridge: { Castle: 3 },
  Castle: {},
};

function shortestPaths(graph: Graph, source: string): Map<string, { distance: number; via?: string }> {
  const settled = new Map<string, { distance: number; via?: string }>();
  const best = new Map<string, { distance: number; via?: string }>([[source, { distance: 0 }]]);
  const frontier = new IndexedHeap<string>({ arity: 4, label: "dijkstra" });
  frontier.insert(source, 0);

  while (!frontier.isEmpty()) {
    const { element: town, priority: distance } = frontier.extractMin();
    settled.set(town, best.get(town) ?? { distance });

    for (const [next, length] of Object.entries(graph[town] ?? {})) {
      if (settled.has(next)) continue;

      const candidate = distance + length;
      const known = best.get(next);
      if (known === undefined || candidate < known.distance) {
        best.set(next, { distance: candidate, via: town });
        frontier.enqueueOrUpdate(next, candidate);
      }
    }
  }

  return settled;
}

function route(paths: Map<string, { via?: string }>, target: string): string[] {
  const hops: string[] = [];
  for (let town: string | undefined = target; town !== undefined; town = paths.get(town)?.via) {
    hops.unshift(town);
  }
  return hops;
}

function main(): void {
  console.log("🗺️  Shortest paths from Harbor");
  const paths = shortestPaths(roads, "Harbor");

  for (const [town, { distance }] of paths) {
    console.log(`   ${town.padEnd(8)} ${String(distance).padStart(3)}  ${route(paths, town).join(" -> ")}`);
  }

  console.log("\n✅ Example completed successfully!");
}

main();
