/**
 * Configuration Tests
 */

import { describe, it, expect } from "vitest";
import { loadRaffleConfig, DEFAULT_CONTRACT_ADDRESS } from "../config";
import { CORRECTED_POLICY, LEGACY_POLICY } from "../../raffle/policy";
import { isRaffleError } from "../../errors";

describe("loadRaffleConfig", () => {
  it("should apply defaults for an empty environment", () => {
    const config = loadRaffleConfig({});

    expect(config.environment).toBe("development");
    expect(config.logLevel).toBe("debug");
    expect(config.serviceName).toBe("escrow-raffle");
    expect(config.policy).toEqual(LEGACY_POLICY);
    expect(config.contractAddress.toLowerCase()).toBe(DEFAULT_CONTRACT_ADDRESS);
    expect(config.membershipAsset).toBe("0x0000000000000000000000000000000000000000");
    expect(config.operator).toBeUndefined();
  });

  it("should default to info logging in production", () => {
    expect(loadRaffleConfig({ NODE_ENV: "production" }).logLevel).toBe("info");
    expect(loadRaffleConfig({ NODE_ENV: "production", LOG_LEVEL: "warn" }).logLevel).toBe("warn");
  });

  it("should resolve the corrected preset with overrides", () => {
    const config = loadRaffleConfig({
      RAFFLE_POLICY: "corrected",
      RAFFLE_FREE_TRACK_SLOTS: "per-ticket",
    });

    expect(config.policy).toEqual({ ...CORRECTED_POLICY, freeTrackPoolSlots: "per-ticket" });
  });

  it("should checksum configured addresses", () => {
    const config = loadRaffleConfig({
      RAFFLE_OPERATOR_ADDRESS: "0x1010101010101010101010101010101010101010",
      RAFFLE_MEMBERSHIP_ASSET: "0x8080808080808080808080808080808080808080",
    });

    expect(config.operator).toBe("0x1010101010101010101010101010101010101010");
    expect(config.membershipAsset).toBe("0x8080808080808080808080808080808080808080");
  });

  it("should report every invalid variable", () => {
    let caught: unknown;
    try {
      loadRaffleConfig({ RAFFLE_POLICY: "strict", RAFFLE_OPERATOR_ADDRESS: "nope" });
    } catch (error) {
      caught = error;
    }

    expect(isRaffleError(caught)).toBe(true);
    if (!isRaffleError(caught)) return;
    expect(caught.errorCode).toBe("SYSTEM_INVALID_CONFIG");
    expect(caught.kind).toBe("Configuration");
    expect(caught.details).toEqual({
      issues: {
        RAFFLE_POLICY: expect.any(String),
        RAFFLE_OPERATOR_ADDRESS: "Invalid address",
      },
    });
  });
});
