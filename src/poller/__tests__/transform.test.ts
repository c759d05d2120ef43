/**
 * Poller Module - Transform Tests
 *
 * Unit tests for change tracking and checkpoint bookkeeping.
 */
import { describe, expect, it, vi } from "vitest";

vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
}));

import { createInitialState } from "../schema.js";
import {
  advanceCheckpoint,
  checkpointFromTime,
  formatFailureMessage,
  isNovelMessage,
  recordNotification,
} from "../transform.js";

const MESSAGE = 'Changed review status for "hw1". Placed under review by reviewer.';

describe("isNovelMessage", () => {
  it("treats any message as novel before the first delivery", () => {
    const state = createInitialState(0);

    expect(isNovelMessage(state, MESSAGE)).toBe(true);
  });

  it("treats the empty string as novel before the first delivery", () => {
    expect(isNovelMessage(createInitialState(0), "")).toBe(true);
  });

  it("suppresses the message recorded last", () => {
    const state = createInitialState(0);

    expect(isNovelMessage(state, MESSAGE)).toBe(true);
    const recorded = recordNotification(state, MESSAGE);
    expect(isNovelMessage(recorded, MESSAGE)).toBe(false);
  });

  it("compares text exactly", () => {
    const state = recordNotification(createInitialState(0), MESSAGE);

    expect(isNovelMessage(state, `${MESSAGE} `)).toBe(true);
    expect(isNovelMessage(state, MESSAGE.toUpperCase())).toBe(true);
  });

  it("accepts a message again once another one was recorded", () => {
    const first = recordNotification(createInitialState(0), MESSAGE);
    const second = recordNotification(first, "other");

    expect(isNovelMessage(second, MESSAGE)).toBe(true);
  });
});

describe("recordNotification", () => {
  it("does not mutate the previous state", () => {
    const state = createInitialState(10);
    const next = recordNotification(state, MESSAGE);

    expect(state.lastNotification).toBeNull();
    expect(next).toEqual({ checkpoint: 10, lastNotification: MESSAGE });
  });
});

describe("advanceCheckpoint", () => {
  it("moves to a newer server checkpoint", () => {
    expect(advanceCheckpoint(createInitialState(500), 1000).checkpoint).toBe(1000);
  });

  it("keeps the checkpoint when the server sends none", () => {
    expect(advanceCheckpoint(createInitialState(500), undefined).checkpoint).toBe(500);
  });

  it("never moves backwards", () => {
    expect(advanceCheckpoint(createInitialState(500), 300).checkpoint).toBe(500);
  });
});

describe("checkpointFromTime", () => {
  it("converts milliseconds to whole seconds", () => {
    expect(checkpointFromTime(1_700_000_000_999)).toBe(1_700_000_000);
  });
});

describe("formatFailureMessage", () => {
  it("describes status API failures", () => {
    expect(
      formatFailureMessage({
        type: "PROTOCOL_FAILURE",
        message: "HTTP 500: Internal Server Error",
        statusCode: 500,
      }),
    ).toBe(
      "Program failure: Status API request failed: HTTP 500: Internal Server Error",
    );
  });

  it("describes interpretation failures", () => {
    expect(formatFailureMessage({ type: "UNKNOWN_STATUS", status: "lost" })).toBe(
      'Program failure: Unknown review status: "lost"',
    );
  });

  it("describes unexpected errors", () => {
    expect(formatFailureMessage({ type: "UNEXPECTED", message: "boom" })).toBe(
      "Program failure: boom",
    );
  });
});
