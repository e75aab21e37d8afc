import { GraphModel, VertexId } from "../model.js";

export type StronglyConnectedComponent = VertexId[];

/**
 * Tarjan's strongly connected components. Components come out in reverse
 * topological order of the condensation; vertices inside a component are
 * sorted ascending.
 */
export function tarjanScc(graph: GraphModel): StronglyConnectedComponent[] {
  let index = 0;
  const stack: VertexId[] = [];
  const onStack = new Set<VertexId>();
  const indices = new Map<VertexId, number>();
  const lowlinks = new Map<VertexId, number>();
  const components: StronglyConnectedComponent[] = [];

  const lowlink = (vertex: VertexId): number => lowlinks.get(vertex) ?? Number.POSITIVE_INFINITY;

  const visit = (vertex: VertexId): void => {
    indices.set(vertex, index);
    lowlinks.set(vertex, index);
    index++;
    stack.push(vertex);
    onStack.add(vertex);

    for (const arc of graph.getOutgoing(vertex)) {
      const neighbor = arc.to;
      if (!indices.has(neighbor)) {
        visit(neighbor);
        lowlinks.set(vertex, Math.min(lowlink(vertex), lowlink(neighbor)));
      } else if (onStack.has(neighbor)) {
        lowlinks.set(vertex, Math.min(lowlink(vertex), indices.get(neighbor) ?? Number.POSITIVE_INFINITY));
      }
    }

    if (lowlinks.get(vertex) === indices.get(vertex)) {
      const component: VertexId[] = [];
      while (true) {
        const candidate = stack.pop();
        if (candidate === undefined) {
          break;
        }
        onStack.delete(candidate);
        component.push(candidate);
        if (candidate === vertex) {
          break;
        }
      }
      components.push(component.sort((left, right) => left - right));
    }
  };

  for (const vertex of graph.listVertices()) {
    if (!indices.has(vertex)) {
      visit(vertex);
    }
  }

  return components;
}
