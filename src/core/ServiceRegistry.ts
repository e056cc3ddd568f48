import { ServiceSpec } from '../types/Service';
import { logger } from '../utils/Logger';
import {
  CyclicDependencyError,
  DuplicateServiceError,
  UnknownDependencyError,
} from '../utils/errors';

interface ServiceNode {
  spec: ServiceSpec;
  index: number;
  dependents: string[];
}

/**
 * Immutable, validated view over the declared services.
 *
 * Construction fails with UnknownDependencyError, CyclicDependencyError or
 * DuplicateServiceError; after that every query is infallible.
 */
export class ServiceRegistry {
  private readonly nodes: Map<string, ServiceNode> = new Map();
  private readonly ordered: readonly ServiceSpec[];

  constructor(services: ServiceSpec[]) {
    this.buildDependencyGraph(services);
    this.validateDependencies();
    this.detectCircularDependencies();
    this.ordered = Object.freeze(this.topologicalOrder());

    logger.debug(`Service order: ${this.ordered.map(s => s.name).join(' → ')}`);
  }

  /**
   * Services sorted so that each one follows everything it depends on. Among
   * services that are ready at the same time, declaration order wins.
   */
  orderedServices(): readonly ServiceSpec[] {
    return this.ordered;
  }

  get(name: string): ServiceSpec | undefined {
    return this.nodes.get(name)?.spec;
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  get size(): number {
    return this.nodes.size;
  }

  dependentsOf(name: string): string[] {
    return [...(this.nodes.get(name)?.dependents ?? [])];
  }

  /**
   * Groups services by depth: phase 0 has no dependencies, phase N depends
   * only on services in earlier phases.
   */
  phases(): ServiceSpec[][] {
    const phases: ServiceSpec[][] = [];
    const placed = new Set<string>();

    while (placed.size < this.nodes.size) {
      const phase = this.ordered.filter(
        spec => !placed.has(spec.name) && spec.dependsOn.every(dep => placed.has(dep))
      );
      phase.forEach(spec => placed.add(spec.name));
      phases.push(phase);
    }

    return phases;
  }

  describe(): string {
    const output: string[] = [];

    output.push('🚀 Startup plan:\n');
    this.phases().forEach((phase, index) => {
      output.push(`Phase ${index + 1}: ${phase.map(s => s.name).join(', ')}`);
    });
    output.push('');
    output.push('📊 Dependency tree:\n');

    const roots = this.ordered.filter(spec => spec.dependsOn.length === 0);
    const visited = new Set<string>();

    const printTree = (name: string, indent: string, isLast: boolean): void => {
      const spec = this.get(name);
      const optional = spec?.optional ? ' (optional)' : '';
      const seen = visited.has(name);
      output.push(`${indent}${isLast ? '└── ' : '├── '}${name}${optional}${seen ? ' …' : ''}`);
      if (seen) return;
      visited.add(name);

      const dependents = this.dependentsOf(name);
      dependents.forEach((dependent, index) => {
        printTree(dependent, indent + (isLast ? '    ' : '│   '), index === dependents.length - 1);
      });
    };

    roots.forEach((root, index) => printTree(root.name, '', index === roots.length - 1));
    output.push('');
    output.push(`Total: ${this.size} services in ${this.phases().length} phases`);

    return output.join('\n');
  }

  private buildDependencyGraph(services: ServiceSpec[]): void {
    services.forEach((spec, index) => {
      if (this.nodes.has(spec.name)) {
        throw new DuplicateServiceError(spec.name);
      }
      this.nodes.set(spec.name, { spec, index, dependents: [] });
    });

    for (const [serviceName, node] of this.nodes) {
      for (const dependency of node.spec.dependsOn) {
        const dependents = this.nodes.get(dependency)?.dependents;
        if (dependents && !dependents.includes(serviceName)) {
          dependents.push(serviceName);
        }
      }
    }
  }

  private validateDependencies(): void {
    for (const [serviceName, node] of this.nodes) {
      for (const dependency of node.spec.dependsOn) {
        if (!this.nodes.has(dependency)) {
          throw new UnknownDependencyError(serviceName, dependency);
        }
      }
    }
  }

  private detectCircularDependencies(): void {
    const visited = new Set<string>();
    const recursionStack = new Set<string>();

    const visit = (serviceName: string, path: string[]): void => {
      if (recursionStack.has(serviceName)) {
        const cycleStart = path.indexOf(serviceName);
        throw new CyclicDependencyError([...path.slice(cycleStart), serviceName]);
      }

      if (visited.has(serviceName)) {
        return;
      }

      visited.add(serviceName);
      recursionStack.add(serviceName);

      for (const dependency of this.nodes.get(serviceName)?.spec.dependsOn ?? []) {
        visit(dependency, [...path, serviceName]);
      }

      recursionStack.delete(serviceName);
    };

    for (const serviceName of this.nodes.keys()) {
      visit(serviceName, []);
    }
  }

  // Kahn's algorithm, always taking the lowest declaration index that is ready
  private topologicalOrder(): ServiceSpec[] {
    const remaining = new Map<string, number>();
    for (const [name, node] of this.nodes) {
      remaining.set(name, new Set(node.spec.dependsOn).size);
    }

    const result: ServiceSpec[] = [];
    const ready = [...this.nodes.values()].filter(node => remaining.get(node.spec.name) === 0);

    while (ready.length > 0) {
      ready.sort((a, b) => a.index - b.index);
      const next = ready.shift();
      if (!next) break;
      result.push(next.spec);

      for (const dependent of next.dependents) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        const node = this.nodes.get(dependent);
        if (count === 0 && node) {
          ready.push(node);
        }
      }
    }

    return result;
  }
}
