export type Requirement = {
  name: string;
  version: string | null;
};

/** Parses `name[==version]` lines; blank lines and `#` comments are skipped. */
export function parseManifest(text: string): Requirement[] {
  const requirements: Requirement[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    const separator = line.indexOf("==");
    if (separator < 0) {
      requirements.push({ name: line, version: null });
      continue;
    }
    const name = line.slice(0, separator).trim();
    const version = line.slice(separator + 2).trim();
    if (!name) continue;
    requirements.push({ name, version: version || null });
  }
  return requirements;
}

export function requirementSpec(requirement: Requirement): string {
  return requirement.version ? `${requirement.name}@${requirement.version}` : requirement.name;
}
