import type { DirectoryCapabilities, DirectoryType } from "../types";

const CAPABILITIES: Record<DirectoryType, DirectoryCapabilities> = {
  "active-directory": { anr: true, binaryGuid: true },
  openldap: { anr: false, binaryGuid: false },
  generic: { anr: false, binaryGuid: false },
};

/**
 * Resolve what the given directory server family supports.
 */
export function getDirectoryCapabilities(type: DirectoryType): DirectoryCapabilities {
  return CAPABILITIES[type];
}
