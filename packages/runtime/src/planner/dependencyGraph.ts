import type { PlanIssue } from "../errors/index.js";

export interface DependencyNode {
  id: string;
  dependencies: readonly string[];
}

export interface GraphValidationOptions {
  maxSubtasks?: number;
}

/**
 * 校验依赖图：非空、数量上限、ID 唯一、依赖可解析、无环。
 * 返回全部问题而不是在第一个问题处中止，便于修复提示一次性带上。
 */
export function validateDependencyGraph(
  nodes: readonly DependencyNode[],
  options: GraphValidationOptions = {}
): PlanIssue[] {
  const issues: PlanIssue[] = [];

  if (nodes.length === 0) {
    issues.push({ code: "empty_plan", message: "Plan contains no subtasks" });
    return issues;
  }

  if (
    typeof options.maxSubtasks === "number" &&
    nodes.length > options.maxSubtasks
  ) {
    issues.push({
      code: "too_many_subtasks",
      message: `Plan has ${nodes.length} subtasks, limit is ${options.maxSubtasks}`,
    });
  }

  const ids = new Set<string>();
  nodes.forEach((node) => {
    if (ids.has(node.id)) {
      issues.push({
        code: "duplicate_id",
        message: `Duplicate subtask id "${node.id}"`,
        subtaskId: node.id,
      });
    }
    ids.add(node.id);
  });

  let unresolved = false;
  nodes.forEach((node) => {
    node.dependencies.forEach((dependency) => {
      if (!ids.has(dependency)) {
        unresolved = true;
        issues.push({
          code: "unknown_dependency",
          message: `Subtask "${node.id}" depends on unknown subtask "${dependency}"`,
          subtaskId: node.id,
        });
      }
    });
  });

  // 依赖无法解析时环检测没有意义
  if (!unresolved) {
    const cyclic = findCyclicNodes(nodes);
    if (cyclic.length > 0) {
      issues.push({
        code: "cycle",
        message: `Dependency cycle among subtasks: ${cyclic.join(", ")}`,
      });
    }
  }

  return issues;
}

/**
 * 稳定的拓扑排序：每一轮选择声明顺序最靠前、且依赖都已排出的节点。
 * 调用前应先通过 validateDependencyGraph。
 */
export function topologicalOrder(nodes: readonly DependencyNode[]): string[] {
  const order: string[] = [];
  const placed = new Set<string>();

  while (order.length < nodes.length) {
    const next = nodes.find(
      (node) =>
        !placed.has(node.id) &&
        node.dependencies.every((dependency) => placed.has(dependency))
    );
    if (!next) {
      throw new Error(
        `Cannot order subtasks, cycle among: ${nodes
          .filter((node) => !placed.has(node.id))
          .map((node) => node.id)
          .join(", ")}`
      );
    }
    placed.add(next.id);
    order.push(next.id);
  }

  return order;
}

function findCyclicNodes(nodes: readonly DependencyNode[]): string[] {
  const placed = new Set<string>();
  let progressed = true;
  while (progressed) {
    progressed = false;
    for (const node of nodes) {
      if (
        !placed.has(node.id) &&
        node.dependencies.every((dependency) => placed.has(dependency))
      ) {
        placed.add(node.id);
        progressed = true;
      }
    }
  }
  return nodes.filter((node) => !placed.has(node.id)).map((node) => node.id);
}
