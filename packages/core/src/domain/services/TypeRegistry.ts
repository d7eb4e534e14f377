import type { TypeDefinition } from '../model/TypeDefinition.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('type-registry');

/**
 * Name → behaviour bundle lookup shared by every validation call.
 *
 * Entries are only ever added or replaced. Replace built-ins during start-up:
 * an overwrite changes every later validation that references the name.
 */
export class TypeRegistry {
  private readonly types = new Map<string, TypeDefinition>();

  constructor(initial?: Readonly<Record<string, TypeDefinition>>) {
    if (initial) {
      for (const [name, definition] of Object.entries(initial)) {
        this.types.set(name, definition);
      }
    }
  }

  get(name: string): TypeDefinition | undefined {
    return this.types.get(name);
  }

  has(name: string): boolean {
    return this.types.has(name);
  }

  /** Register or replace a type. Last write wins. */
  set(name: string, definition: TypeDefinition): TypeDefinition {
    if (this.types.has(name)) {
      logger.debug({ type: name }, 'overriding type definition');
    }
    this.types.set(name, definition);
    return definition;
  }

  names(): string[] {
    return [...this.types.keys()];
  }
}
