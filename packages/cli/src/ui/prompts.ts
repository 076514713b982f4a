import * as p from "@clack/prompts";
import { isKebabCase, SKILL_DESCRIPTION_MAX, SKILL_NAME_MAX } from "@skillbook/core";

function ensureNotCancelled<T>(value: T | symbol): T {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
  return value;
}

export async function askSkillName(): Promise<string> {
  return ensureNotCancelled(
    await p.text({
      message: "Skill name",
      placeholder: "react-component-patterns",
      validate: (value) => {
        if (!isKebabCase(value)) return "Use kebab-case: lowercase letters, digits and hyphens";
        if (value.length > SKILL_NAME_MAX) return `At most ${SKILL_NAME_MAX} characters`;
        return undefined;
      },
    }),
  );
}

export async function askDescription(name: string): Promise<string> {
  return ensureNotCancelled(
    await p.text({
      message: `When should ${name} be used?`,
      placeholder: "Use when writing or reviewing React components.",
      validate: (value) => {
        if (value.trim() === "") return "A trigger description is required";
        if (value.length > SKILL_DESCRIPTION_MAX) return `At most ${SKILL_DESCRIPTION_MAX} characters`;
        return undefined;
      },
    }),
  );
}

export async function askReferences(): Promise<boolean> {
  return ensureNotCancelled(
    await p.confirm({
      message: "Add a references/ directory with an overview file?",
      initialValue: false,
    }),
  );
}
