import type { BaseRule } from "./base.js";

class RuleRegistry {
  private rules: Map<string, BaseRule> = new Map();

  register(rule: BaseRule): void {
    this.rules.set(rule.id, rule);
  }

  get(id: string): BaseRule | undefined {
    return this.rules.get(id);
  }

  has(id: string): boolean {
    return this.rules.has(id);
  }

  list(): string[] {
    return [...this.rules.keys()];
  }

  getAll(): BaseRule[] {
    return [...this.rules.values()];
  }

  clear(): void {
    this.rules.clear();
  }
}

declare global {
  // eslint-disable-next-line no-var
  var __skillbook_rule_registry: RuleRegistry | undefined;
}

export const registry = (globalThis.__skillbook_rule_registry ??= new RuleRegistry());
export type { RuleRegistry };
