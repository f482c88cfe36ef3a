import { describe, expect, test } from "vitest";
import {
  classifyAge,
  isNoopPolicy,
  selectFlat,
  selectForDeletion,
  selectTiered,
} from "../../src/core/cleanup/retention";
import type { BackupArtifact } from "../../src/types";
import { daysBefore, vmArtifact } from "../helpers";

const NOW = new Date("2024-06-01T00:00:00Z");

function names(artifacts: BackupArtifact[]): string[] {
  return artifacts.map((a) => a.timestamp.toISOString());
}

function aged(...days: number[]): BackupArtifact[] {
  return days.map((d) => vmArtifact("web", daysBefore(NOW, d)));
}

describe("retention", () => {
  describe("classifyAge", () => {
    test.each([
      [0.5, "daily"],
      [1, "daily"],
      [1.5, "weekly"],
      [7, "weekly"],
      [7.5, "monthly"],
      [30, "monthly"],
      [365, "yearly"],
      [365.5, null],
    ])("classifies %d days as %s", (days, tier) => {
      expect(classifyAge(days)).toBe(tier);
    });
  });

  describe("isNoopPolicy", () => {
    test("is true only for an all-zero tiered policy", () => {
      expect(isNoopPolicy({ type: "tiered", daily: 0, weekly: 0, monthly: 0, yearly: 0 })).toBe(true);
      expect(isNoopPolicy({ type: "tiered", daily: 0, weekly: 1, monthly: 0, yearly: 0 })).toBe(false);
      expect(isNoopPolicy({ type: "flat", count: 1 })).toBe(false);
    });
  });

  describe("flat policy", () => {
    test("deletes exactly the two oldest of five with count 3", () => {
      const artifacts = aged(2, 5, 1, 4, 3);

      const selection = selectFlat(artifacts, { type: "flat", count: 3 });

      expect(names(selection.delete)).toEqual([
        daysBefore(NOW, 4).toISOString(),
        daysBefore(NOW, 5).toISOString(),
      ]);
      expect(selection.keep).toHaveLength(3);
    });

    test("deletes nothing with count or fewer artifacts", () => {
      expect(selectFlat(aged(1, 2, 3), { type: "flat", count: 3 }).delete).toEqual([]);
      expect(selectFlat(aged(1), { type: "flat", count: 3 }).delete).toEqual([]);
    });

    test("keeps listing order for equal timestamps", () => {
      const first = vmArtifact("web", NOW, "a");
      const second = vmArtifact("web", NOW, "b");

      const selection = selectFlat([first, second], { type: "flat", count: 1 });

      expect(selection.keep).toEqual([first]);
      expect(selection.delete).toEqual([second]);
    });

    test("is idempotent", () => {
      const policy = { type: "flat", count: 2 } as const;
      const first = selectForDeletion(aged(1, 2, 3, 4), policy, NOW);
      const second = selectForDeletion(first.keep, policy, NOW);

      expect(first.delete).toHaveLength(2);
      expect(second.delete).toEqual([]);
    });

    test("rotates each VM and host independently", () => {
      const artifacts = [
        vmArtifact("web", daysBefore(NOW, 1)),
        vmArtifact("web", daysBefore(NOW, 2)),
        vmArtifact("db", daysBefore(NOW, 3)),
        vmArtifact("web", daysBefore(NOW, 4), "xen02"),
      ];

      const selection = selectForDeletion(artifacts, { type: "flat", count: 1 }, NOW);

      expect(selection.delete).toEqual([artifacts[1]]);
      expect(selection.keep).toHaveLength(3);
    });
  });

  describe("tiered policy", () => {
    test("deletes the artifact that pushes a tier past its count", () => {
      const artifacts = aged(0.2, 0.5, 3, 4, 5, 20);

      const selection = selectTiered(
        artifacts,
        { type: "tiered", daily: 1, weekly: 2, monthly: 0, yearly: 0 },
        NOW,
      );

      expect(names(selection.delete)).toEqual(
        [20, 3, 0.2].map((d) => daysBefore(NOW, d).toISOString()),
      );
      expect(names(selection.keep)).toEqual(
        [5, 4, 0.5].map((d) => daysBefore(NOW, d).toISOString()),
      );
    });

    test("counts an artifact exactly one day old as daily", () => {
      const selection = selectTiered(
        aged(1),
        { type: "tiered", daily: 1, weekly: 0, monthly: 0, yearly: 0 },
        NOW,
      );

      expect(selection.delete).toEqual([]);
    });

    test("counts an artifact exactly seven days old as weekly", () => {
      const selection = selectTiered(
        aged(7),
        { type: "tiered", daily: 0, weekly: 1, monthly: 0, yearly: 0 },
        NOW,
      );

      expect(selection.delete).toEqual([]);
    });

    test("never deletes artifacts older than a year", () => {
      const selection = selectTiered(
        aged(400, 500),
        { type: "tiered", daily: 1, weekly: 1, monthly: 1, yearly: 0 },
        NOW,
      );

      expect(selection.delete).toEqual([]);
      expect(selection.keep).toHaveLength(2);
    });

    test("all-zero tiers keep everything", () => {
      const artifacts = aged(1, 2, 3);

      const selection = selectForDeletion(
        artifacts,
        { type: "tiered", daily: 0, weekly: 0, monthly: 0, yearly: 0 },
        NOW,
      );

      expect(selection.keep).toEqual(artifacts);
      expect(selection.delete).toEqual([]);
    });
  });
});
