/**
 * Prompt template utilities. Templates use {name} placeholders.
 */

export interface PromptTemplate {
  system?: string;
  template: string;
  variables: string[];
}

/**
 * Substitute {name} placeholders. Unknown placeholders are left in place.
 */
export function buildPrompt(template: string, variables: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : match,
  );
}

export function createPromptTemplate(
  template: string,
  options?: { system?: string },
): PromptTemplate {
  const variables: string[] = [];
  for (const match of template.matchAll(/\{(\w+)\}/g)) {
    if (!variables.includes(match[1])) {
      variables.push(match[1]);
    }
  }

  return {
    system: options?.system,
    template,
    variables,
  };
}

/**
 * Fill a template. Throws when a declared variable is missing.
 */
export function executeTemplate(
  template: PromptTemplate,
  variables: Record<string, string>,
): { prompt: string; system?: string } {
  const missingVars = template.variables.filter((v) => !(v in variables));
  if (missingVars.length > 0) {
    throw new Error(`Missing template variables: ${missingVars.join(', ')}`);
  }

  return {
    prompt: buildPrompt(template.template, variables),
    system: template.system,
  };
}

/** Render a structured value for inclusion in a prompt. */
export function formatForPrompt(value: unknown): string {
  if (typeof value === 'string') return value;
  return JSON.stringify(value, null, 2);
}

/**
 * Instruction block that pins the model to a JSON shape.
 */
export function jsonShapeInstruction(shape: string): string {
  return `Return ONLY valid JSON matching this shape. No markdown, no commentary.\n${shape}`;
}
