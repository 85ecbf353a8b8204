/**
 * Resolved runtime settings.
 */

export interface Settings {
  /** Directory holding the *.yml profiles and aliases.txt */
  configDir: string;
  /** Executable of the coding assistant */
  command: string;
  /** Flag the assistant takes its config file path with */
  configFlag: string;
}

export interface SettingsOverrides {
  configDir?: string;
  command?: string;
  configFlag?: string;
}
