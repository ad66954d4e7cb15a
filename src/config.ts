import { clone } from "@mongez/reinforcements";
import type { DirectoryConfigurations } from "./types";

const defaultConfigurations: DirectoryConfigurations = {
  debugLevel: "warn",
  pageSize: 1000,
  bypass: {
    attach: {
      kinds: ["already-exists"],
      messages: ["already exists"],
    },
    detach: {
      kinds: ["unwilling-to-perform"],
      messages: ["server is unwilling to perform"],
    },
  },
};

let configurations: DirectoryConfigurations = clone(defaultConfigurations);

export function setDirectoryConfigurations(
  directoryConfigurations: Partial<DirectoryConfigurations>,
) {
  configurations = {
    ...configurations,
    ...directoryConfigurations,
    bypass: {
      ...configurations.bypass,
      ...directoryConfigurations.bypass,
    },
  };
}

/**
 * Restore the default configurations
 */
export function resetDirectoryConfigurations() {
  configurations = clone(defaultConfigurations);
}

export function getDirectoryConfigurations() {
  return configurations;
}

export function getDirectoryConfig<Key extends keyof DirectoryConfigurations>(
  key: Key,
): DirectoryConfigurations[Key] {
  return configurations[key];
}

export function getDirectoryDebugLevel(): DirectoryConfigurations["debugLevel"] {
  return configurations.debugLevel || "warn";
}
