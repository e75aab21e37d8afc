export * from "./lexer.js";
export * from "./parser.js";
export * from "./model.js";
export * from "./compiler.js";
export * from "./printer.js";
export * from "./algorithms/dijkstra.js";
export * from "./algorithms/tarjan.js";
export * from "./algorithms/criticalPath.js";
export * from "./algorithms/cycles.js";
export * from "./algorithms/traversal.js";
export * from "./algorithms/connectivity.js";
export * from "./algorithms/spanning.js";
export * from "./algorithms/flow.js";
export * from "./algorithms/cliques.js";
export * from "./algorithms/coloring.js";
export * from "./algorithms/euler.js";
export * from "./algorithms/hamilton.js";
export * from "./algorithms/trees.js";
export * from "./algorithms/cores.js";
