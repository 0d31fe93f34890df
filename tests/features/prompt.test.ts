/**
 * Walletlist — tests/features/prompt.test.ts
 * WHAT: Tests for idempotent prompt posting.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../../src/lib/logger.js", () => ({
  logger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

import { PromptPoster } from "../../src/features/prompt.js";
import { SettingsStore } from "../../src/store/settingsStore.js";
import { MemoryBackend } from "../utils/memoryBackend.js";
import { FakeMessenger } from "../utils/fakeMessenger.js";

let store: SettingsStore;
let messenger: FakeMessenger;
let poster: PromptPoster;

beforeEach(async () => {
  store = await SettingsStore.load(new MemoryBackend());
  messenger = new FakeMessenger();
  poster = new PromptPoster(store, messenger);
});

async function configure(channelId: string | null, open: boolean) {
  await store.mutate((draft) => {
    draft.whitelistChannelId = channelId;
    draft.whitelistStatus = open;
  });
}

describe("PromptPoster.ensurePromptPosted", () => {
  it("skips when no channel is configured", async () => {
    expect(await poster.ensurePromptPosted()).toEqual({ status: "skipped", reason: "no_channel" });
    expect(messenger.hasExistingPrompt).not.toHaveBeenCalled();
  });

  it("skips when the whitelist is closed", async () => {
    await configure("123", false);
    expect(await poster.ensurePromptPosted()).toEqual({ status: "skipped", reason: "closed" });
    expect(messenger.postPrompt).not.toHaveBeenCalled();
  });

  it("posts when the channel has no prompt", async () => {
    await configure("123", true);

    expect(await poster.ensurePromptPosted()).toEqual({ status: "posted", channelId: "123" });
    expect(messenger.postPrompt).toHaveBeenCalledWith("123");
  });

  it("does not post a second prompt", async () => {
    await configure("123", true);
    messenger.channelsWithPrompt.add("123");

    expect(await poster.ensurePromptPosted()).toEqual({ status: "already_present", channelId: "123" });
    expect(messenger.postPrompt).not.toHaveBeenCalled();
  });

  it("posts exactly once when called concurrently", async () => {
    await configure("123", true);

    const outcomes = await Promise.all([
      poster.ensurePromptPosted(),
      poster.ensurePromptPosted(),
      poster.ensurePromptPosted(),
    ]);

    expect(messenger.postPrompt).toHaveBeenCalledTimes(1);
    expect(outcomes.map((o) => o.status).sort()).toEqual(["already_present", "already_present", "posted"]);
  });

  it("returns a failed outcome when Discord rejects the post", async () => {
    await configure("123", true);
    const error = new Error("Missing Access");
    messenger.postError = error;

    expect(await poster.ensurePromptPosted()).toEqual({ status: "failed", channelId: "123", error });
  });

  it("returns a failed outcome when the existence check throws", async () => {
    await configure("123", true);
    const error = new Error("Unknown Channel");
    messenger.hasExistingPrompt.mockRejectedValueOnce(error);

    expect(await poster.ensurePromptPosted()).toEqual({ status: "failed", channelId: "123", error });
    expect(messenger.postPrompt).not.toHaveBeenCalled();
  });

  it("keeps separate channels independent", async () => {
    await configure("123", true);
    await poster.ensurePromptPosted();
    await configure("456", true);

    expect(await poster.ensurePromptPosted()).toEqual({ status: "posted", channelId: "456" });
    expect(messenger.postPrompt).toHaveBeenCalledTimes(2);
  });
});
