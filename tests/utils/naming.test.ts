import { describe, expect, test } from "vitest";
import { ArtifactNameError, DecodeError } from "../../src/utils/errors";
import {
  artifactIdentityKey,
  createArtifact,
  decodeArtifactName,
  encodeArtifactName,
  filterForArtifact,
  formatArtifactTimestamp,
  tryDecodeArtifactName,
} from "../../src/utils/naming";

const SNAPSHOT_TIME = new Date("2024-02-09T10:19:02Z");

describe("naming utilities", () => {
  describe("formatArtifactTimestamp", () => {
    test("formats whole seconds with a numeric UTC offset", () => {
      expect(formatArtifactTimestamp(SNAPSHOT_TIME)).toBe("2024-02-09T10:19:02+00:00");
    });

    test("keeps non-zero milliseconds", () => {
      expect(formatArtifactTimestamp(new Date("2024-02-09T10:19:02.500Z"))).toBe(
        "2024-02-09T10:19:02.500+00:00",
      );
    });

    test("rejects invalid dates", () => {
      expect(() => formatArtifactTimestamp(new Date("not a date"))).toThrow(ArtifactNameError);
    });
  });

  describe("createArtifact", () => {
    test("trims host and object name", () => {
      const artifact = createArtifact({
        hostId: " xen01 ",
        jobKind: "vm-backup",
        objectName: "  web  ",
        timestamp: SNAPSHOT_TIME,
      });

      expect(artifact).toEqual({
        hostId: "xen01",
        jobKind: "vm-backup",
        objectName: "web",
        timestamp: SNAPSHOT_TIME,
      });
    });
  });

  describe("encodeArtifactName", () => {
    const artifact = createArtifact({
      hostId: "xen01",
      jobKind: "vm-backup",
      objectName: "mail-server",
      timestamp: SNAPSHOT_TIME,
      compression: "zstd",
    });

    test("encodes with extensions", () => {
      expect(encodeArtifactName(artifact, true)).toBe(
        "xen01__vm__mail-server__2024-02-09T10:19:02+00:00.xva.zst",
      );
    });

    test("encodes without extensions", () => {
      expect(encodeArtifactName(artifact, false)).toBe(
        "xen01__vm__mail-server__2024-02-09T10:19:02+00:00",
      );
    });

    test("leaves out an empty host", () => {
      const single = createArtifact({
        hostId: "",
        jobKind: "vm-backup",
        objectName: "mail-server",
        timestamp: SNAPSHOT_TIME,
      });

      expect(encodeArtifactName(single, true)).toBe("vm__mail-server__2024-02-09T10:19:02+00:00.xva");
    });

    test("uses gz for gzip", () => {
      expect(encodeArtifactName({ ...artifact, compression: "gzip" }, true)).toBe(
        "xen01__vm__mail-server__2024-02-09T10:19:02+00:00.xva.gz",
      );
    });

    test("rejects names containing the separator", () => {
      expect(() => encodeArtifactName({ ...artifact, objectName: "a__b" }, true)).toThrow(
        ArtifactNameError,
      );
    });

    test("rejects empty object names", () => {
      expect(() => encodeArtifactName({ ...artifact, objectName: "   " }, true)).toThrow(
        "Artifact object name must not be empty",
      );
    });

    test("rejects path characters", () => {
      expect(() => encodeArtifactName({ ...artifact, objectName: "a/b" }, true)).toThrow(
        ArtifactNameError,
      );
    });
  });

  describe("decodeArtifactName", () => {
    test("decodes a compressed file name", () => {
      const artifact = decodeArtifactName("xen01__vm__mail-server__2024-02-09T10:19:02+00:00.xva.gz");

      expect(artifact.hostId).toBe("xen01");
      expect(artifact.jobKind).toBe("vm-backup");
      expect(artifact.objectName).toBe("mail-server");
      expect(artifact.timestamp.getTime()).toBe(SNAPSHOT_TIME.getTime());
      expect(artifact.compression).toBe("gzip");
    });

    test("decodes a bare archive name", () => {
      const artifact = decodeArtifactName("xen01__vm__mail-server__2024-02-09T10:19:02+00:00");

      expect(artifact.compression).toBeUndefined();
      expect(artifact.timestamp.getTime()).toBe(SNAPSHOT_TIME.getTime());
    });

    test("decodes a three-field name with an empty host", () => {
      const artifact = decodeArtifactName("vm__mail-server__2024-02-09T10:19:02+00:00.xva");

      expect(artifact.hostId).toBe("");
      expect(artifact.objectName).toBe("mail-server");
    });

    test("honours a non-UTC offset", () => {
      const artifact = decodeArtifactName("xen01__vm__web__2024-02-09T12:19:02+02:00.xva");

      expect(artifact.timestamp.getTime()).toBe(Date.UTC(2024, 1, 9, 10, 19, 2));
    });

    test("is the inverse of encoding", () => {
      const artifact = createArtifact({
        hostId: "pool-a",
        jobKind: "vm-backup",
        objectName: "db01",
        timestamp: new Date("2023-12-31T23:59:59.123Z"),
        compression: "zstd",
      });

      expect(decodeArtifactName(encodeArtifactName(artifact, true))).toEqual(artifact);
    });

    test.each([
      ["notes.txt", "expected 3 or 4 fields"],
      ["xen01__backup__web__2024-02-09T10:19:02+00:00", 'unknown job kind "backup"'],
      ["xen01__vm__web__yesterday", "timestamp is not RFC 3339"],
      ["xen01__vm__web__2024-02-09T10:19:02+00:00junk", "unexpected text after timestamp"],
      ["__vm__web__2024-02-09T10:19:02+00:00", "empty host field"],
      ["xen01__vm____2024-02-09T10:19:02+00:00", "empty object name"],
    ])("rejects %s", (name, reason) => {
      expect(() => decodeArtifactName(name)).toThrow(reason);
      expect(() => decodeArtifactName(name)).toThrow(DecodeError);
    });
  });

  describe("tryDecodeArtifactName", () => {
    test("returns null for foreign names", () => {
      expect(tryDecodeArtifactName("lost+found")).toBeNull();
    });

    test("returns the artifact for our names", () => {
      expect(tryDecodeArtifactName("vm__web__2024-02-09T10:19:02+00:00.xva")?.objectName).toBe("web");
    });
  });

  describe("artifact identity", () => {
    const artifact = createArtifact({
      hostId: "xen01",
      jobKind: "vm-backup",
      objectName: "web",
      timestamp: SNAPSHOT_TIME,
    });

    test("keys by host, kind and object", () => {
      expect(artifactIdentityKey(artifact)).toBe("xen01__vm__web");
    });

    test("builds a filter for the same object", () => {
      expect(filterForArtifact(artifact)).toEqual({
        hostIds: ["xen01"],
        jobKinds: ["vm-backup"],
        objectNames: ["web"],
      });
    });
  });
});
