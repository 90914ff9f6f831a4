/**
 * Cycle Detection
 *
 * Finds every property that sits on a dependency cycle using Tarjan's
 * strongly connected components algorithm. A component counts as a cycle
 * when it has more than one vertex, or a single vertex with a self-loop.
 *
 * @module
 */

import type { PropertyName } from "../declarations/types.js";
import type { DependencyGraph, DependencyNode } from "./dependency-graph.js";

interface VisitState {
  index: number;
  lowlink: number;
}

/**
 * One vertex being explored, with its remaining requirements
 */
interface Frame {
  name: PropertyName;
  state: VisitState;
  node: DependencyNode | undefined;
  pending: Iterator<PropertyName>;
}

/**
 * Find strongly connected components that form cycles
 *
 * Iterative, with an explicit frame stack: dependency chains can be far longer
 * than the call stack allows. Components are returned in discovery order;
 * their members are not sorted.
 */
export function findCyclicComponents(graph: DependencyGraph): PropertyName[][] {
  const visited = new Map<PropertyName, VisitState>();
  const onStack = new Set<PropertyName>();
  const stack: PropertyName[] = [];
  const components: PropertyName[][] = [];
  let currentIndex = 0;

  const open = (name: PropertyName): Frame => {
    const state: VisitState = { index: currentIndex, lowlink: currentIndex };
    visited.set(name, state);
    currentIndex++;
    stack.push(name);
    onStack.add(name);

    const node = graph.get(name);
    const requirements: Iterable<PropertyName> = node ? node.dependsOn : [];
    return { name, state, node, pending: requirements[Symbol.iterator]() };
  };

  const close = (frame: Frame): void => {
    const { name, state, node } = frame;
    if (state.lowlink !== state.index) return;

    // Root of a component: pop it
    const component: PropertyName[] = [];
    let member: PropertyName | undefined;
    do {
      member = stack.pop();
      if (member === undefined) break;
      onStack.delete(member);
      component.push(member);
    } while (member !== name);

    if (component.length > 1 || node?.dependsOn.has(name)) {
      components.push(component);
    }
  };

  for (const root of graph.keys()) {
    if (visited.has(root)) continue;

    const frames: Frame[] = [open(root)];
    let frame = frames.at(-1);
    while (frame) {
      const next = frame.pending.next();
      if (!next.done) {
        const required = next.value;
        const seen = visited.get(required);
        if (!seen) {
          // Not visited yet
          frames.push(open(required));
        } else if (onStack.has(required)) {
          // On the stack, so part of the current component
          frame.state.lowlink = Math.min(frame.state.lowlink, seen.index);
        }
      } else {
        frames.pop();
        close(frame);
        const parent = frames.at(-1);
        if (parent) {
          parent.state.lowlink = Math.min(parent.state.lowlink, frame.state.lowlink);
        }
      }
      frame = frames.at(-1);
    }
  }

  return components;
}

/**
 * Return the set of properties participating in some cycle, or `null` when
 * the graph is acyclic
 *
 * The set iterates in declaration order.
 */
export function findCycle(graph: DependencyGraph): ReadonlySet<PropertyName> | null {
  const components = findCyclicComponents(graph);
  if (components.length === 0) {
    return null;
  }

  const members = new Set(components.flat());
  const ordered = [...graph.keys()].filter((name) => members.has(name));
  return new Set(ordered);
}
