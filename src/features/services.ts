// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { SettingsStore } from "../store/settingsStore.js";
import type { PromptPoster } from "./prompt.js";

/**
 * Long-lived collaborators built once in main() and handed to every handler.
 */
export type AppServices = {
  store: SettingsStore;
  prompt: PromptPoster;
};
