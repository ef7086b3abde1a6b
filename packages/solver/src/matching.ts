import type { HallViolation, PreferenceGraph } from './types';

/** A matching in a preference graph. */
export interface Matching {
  size: number;
  /** Product matched to each buyer, or -1. */
  productOf: number[];
  /** Buyer matched to each product, or -1. */
  buyerOf: number[];
}

function productCount(graph: PreferenceGraph): number {
  let count = graph.length;
  for (const products of graph) {
    for (const p of products) {
      if (p + 1 > count) count = p + 1;
    }
  }
  return count;
}

/**
 * Maximum bipartite matching by augmenting paths, trying buyers in index
 * order and each buyer's products in listed order. O(V·E).
 */
export function maximumMatching(graph: PreferenceGraph): Matching {
  const productOf = new Array<number>(graph.length).fill(-1);
  const buyerOf = new Array<number>(productCount(graph)).fill(-1);

  const augment = (buyer: number, visited: boolean[]): boolean => {
    for (const product of graph[buyer]) {
      if (visited[product]) continue;
      visited[product] = true;
      const holder = buyerOf[product];
      if (holder === -1 || augment(holder, visited)) {
        buyerOf[product] = buyer;
        productOf[buyer] = product;
        return true;
      }
    }
    return false;
  };

  let size = 0;
  for (let buyer = 0; buyer < graph.length; buyer++) {
    if (augment(buyer, new Array<boolean>(buyerOf.length).fill(false))) {
      size++;
    }
  }
  return { size, productOf, buyerOf };
}

/**
 * A perfect matching (every buyer receives a distinct preferred product),
 * or `undefined` when the graph has none.
 */
export function findPerfectMatching(graph: PreferenceGraph): number[] | undefined {
  const matching = maximumMatching(graph);
  return matching.size === graph.length ? matching.productOf : undefined;
}

/**
 * Hall violation read off a maximum matching.
 *
 * Starting at an unmatched buyer, follow preferred products and then their
 * matched buyers. Every product reached is matched (otherwise the matching
 * would augment), so the buyers reached outnumber their neighbourhood by
 * exactly one.
 */
export function findHallViolationByMatching(graph: PreferenceGraph): HallViolation | undefined {
  const { productOf, buyerOf } = maximumMatching(graph);
  const start = productOf.indexOf(-1);
  if (start === -1) {
    return undefined;
  }

  const buyers = new Set<number>([start]);
  const products = new Set<number>();
  const queue = [start];
  while (queue.length > 0) {
    const buyer = queue.shift();
    if (buyer === undefined) break;
    for (const product of graph[buyer]) {
      if (products.has(product)) continue;
      products.add(product);
      const holder = buyerOf[product];
      if (holder !== -1 && !buyers.has(holder)) {
        buyers.add(holder);
        queue.push(holder);
      }
    }
  }

  return {
    buyers: [...buyers].sort((a, b) => a - b),
    products: [...products].sort((a, b) => a - b),
  };
}
