import { ValidationError } from "../errors";

export interface ModelIdentifier {
  owner: string;
  name: string;
  version?: string;
}

const IDENTIFIER = /^(?<owner>[^/:\s]+)\/(?<name>[^/:\s]+)(?::(?<version>[^/:\s]+))?$/;

/** Parses `owner/name` or `owner/name:version`. */
export function parseModelIdentifier(identifier: string): ModelIdentifier {
  const match = IDENTIFIER.exec(identifier.trim());
  const groups = match?.groups;
  if (!groups) {
    throw new ValidationError(
      `Invalid model identifier "${identifier}": expected owner/name or owner/name:version`,
    );
  }
  const parsed: ModelIdentifier = { owner: groups.owner, name: groups.name };
  if (groups.version) {
    parsed.version = groups.version;
  }
  return parsed;
}

/** Like {@link parseModelIdentifier}, but the version is mandatory. */
export function parsePinnedIdentifier(identifier: string): Required<ModelIdentifier> {
  const parsed = parseModelIdentifier(identifier);
  if (!parsed.version) {
    throw new ValidationError(
      `Invalid version identifier "${identifier}": expected owner/name:version`,
    );
  }
  return { owner: parsed.owner, name: parsed.name, version: parsed.version };
}
