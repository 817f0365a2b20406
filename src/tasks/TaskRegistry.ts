import { UnknownTaskError } from '../core/errors.js';
import type { TaskDefinition } from './types.js';

export class TaskRegistry {
  private readonly tasks = new Map<string, TaskDefinition>();

  constructor(definitions: readonly TaskDefinition[] = []) {
    for (const definition of definitions) {
      this.register(definition);
    }
  }

  register(definition: TaskDefinition): void {
    if (this.tasks.has(definition.name)) {
      throw new Error(`Task already registered: ${definition.name}`);
    }
    this.tasks.set(definition.name, definition);
  }

  /**
   * Exact identifier first, then a case-insensitive match on the identifier
   * or the display name.
   */
  resolve(name: string): TaskDefinition | undefined {
    const exact = this.tasks.get(name);
    if (exact) return exact;

    const wanted = name.trim().toUpperCase();
    for (const definition of this.tasks.values()) {
      if (definition.name.toUpperCase() === wanted || definition.displayName.toUpperCase() === wanted) {
        return definition;
      }
    }
    return undefined;
  }

  require(name: string): TaskDefinition {
    const definition = this.resolve(name);
    if (!definition) {
      throw new UnknownTaskError(name);
    }
    return definition;
  }

  list(): TaskDefinition[] {
    return [...this.tasks.values()];
  }
}
