import { Phase } from '../phases/phase-factory';
import { Action } from './action';

export interface ProcedureTemplateInit<N extends string = string> {
  name: string;
  phase: Phase<N>;
  actions: readonly Action[];
}

/**
 * Ordered actions bound to one phase. Immutable once built; the controller
 * runs the actions strictly one after another.
 */
export class ProcedureTemplate<N extends string = string> {
  readonly name: string;
  readonly phase: Phase<N>;
  readonly actions: readonly Action[];

  constructor(init: ProcedureTemplateInit<N>) {
    this.name = init.name;
    this.phase = init.phase;
    this.actions = Object.freeze([...init.actions]);
    Object.freeze(this);
  }

  actionNames(): string[] {
    return this.actions.map((action) => action.name);
  }

  duplicateActionNames(): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const name of this.actionNames()) {
      if (seen.has(name)) {
        duplicates.add(name);
      }
      seen.add(name);
    }
    return Array.from(duplicates);
  }

  toString(): string {
    return `ProcedureTemplate(${this.name} @ ${this.phase.name}: ${this.actionNames().join(' -> ')})`;
  }
}
