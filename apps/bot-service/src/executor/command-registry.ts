import { CommandTemplate } from '@app/shared/types/executor.types';

/**
 * Executor templates keyed by name. Built once at startup and never mutated.
 */
export class CommandRegistry {
  private readonly templates: ReadonlyMap<string, CommandTemplate>;

  constructor(templates: Iterable<CommandTemplate> = []) {
    const map = new Map<string, CommandTemplate>();
    for (const entry of templates) {
      // last one wins on duplicate names
      map.set(entry.name, Object.freeze({ name: entry.name, template: entry.template }));
    }
    this.templates = map;
  }

  lookup(name: string): CommandTemplate | undefined {
    return this.templates.get(name);
  }

  get size(): number {
    return this.templates.size;
  }

  isEmpty(): boolean {
    return this.templates.size === 0;
  }

  names(): string[] {
    return [...this.templates.keys()];
  }
}
