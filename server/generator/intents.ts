const DELEGATION_PATTERN =
  /\b(coordinat(?:e|es|ed|ing|ion|or)|delegat(?:e|es|ed|ing|ion)|oversee(?:s|ing)?|oversaw|supervis(?:e|es|ed|ing|ion|or)|manag(?:e|es|ed|ing|ement)|review(?:s|ed|ing)?|approv(?:e|es|ed|ing|al)|orchestrat(?:e|es|ed|ing|ion|or))\b/i;

const MANAGER_PATTERN = /\b(manager|coordinator|supervisor|lead|director|orchestrator|head|chief)\b/i;

export function hasDelegationLanguage(text: string): boolean {
  return DELEGATION_PATTERN.test(text);
}

/**
 * Names arrive normalized with underscores, so they are split back into words first.
 */
export function readsAsManager(agent: { name: string; role: string }): boolean {
  return MANAGER_PATTERN.test(agent.role) || MANAGER_PATTERN.test(agent.name.replace(/_/g, " "));
}
