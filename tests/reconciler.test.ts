import { describe, it, expect, beforeEach } from "vitest";
import { DateReconciler, type ReconcileOptions } from "../src/pipeline/reconciler";
import { normalizeExtensions, DEFAULT_EXTENSIONS } from "../src/config";
import { EPOCH_FLOOR } from "../src/utils/date";
import { FakeAccessors } from "./fakes";

const now = new Date(2026, 0, 15, 12, 0, 0);

function makeReconciler(accessors: FakeAccessors, options: Partial<ReconcileOptions> = {}): DateReconciler {
  return new DateReconciler(accessors, {
    dryRun: false,
    extensions: normalizeExtensions(DEFAULT_EXTENSIONS),
    now: () => now,
    ...options,
  });
}

describe("DateReconciler", () => {
  let accessors: FakeAccessors;

  beforeEach(() => {
    accessors = new FakeAccessors();
  });

  describe("files without an EXIF date", () => {
    it("copies the modified time into EXIF when the years agree", async () => {
      const file = "/photos/IMG_20190818_130841.jpg";
      accessors.modified.set(file, new Date(2019, 11, 1, 10, 0, 0));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.outcome).toBe("embedded-from-filesystem");
      expect(accessors.embeddedWrites).toEqual([{ file, date: new Date(2019, 11, 1, 10, 0, 0) }]);
      expect(accessors.filesystemWrites).toEqual([]);
    });

    it("applies the extracted date to both when the years differ", async () => {
      const file = "/photos/IMG_20190818_130841.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5, 9, 0, 0));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.outcome).toBe("extracted-applied");
      expect(result.extractedDate).toEqual(new Date(2019, 7, 18, 13, 8, 41));
      expect(accessors.embeddedWrites).toEqual([{ file, date: new Date(2019, 7, 18, 13, 8, 41) }]);
      expect(accessors.filesystemWrites).toEqual([{ file, date: new Date(2019, 7, 18, 13, 8, 41) }]);
    });

    it("changes nothing on a second run", async () => {
      const file = "/photos/IMG_20190818_130841.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5, 9, 0, 0));
      const reconciler = makeReconciler(accessors);

      await reconciler.reconcile(file);
      const second = await reconciler.reconcile(file);

      expect(second.outcome).toBe("embedded-kept");
      expect(second.writes).toEqual([]);
      expect(accessors.embeddedWrites).toHaveLength(1);
      expect(accessors.filesystemWrites).toHaveLength(1);
    });

    it("falls back to the folder name", async () => {
      const file = "/photos/2015/beach.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5, 9, 0, 0));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.outcome).toBe("extracted-applied");
      expect(accessors.embedded.get(file)).toEqual(new Date(2015, 0, 1));
      expect(accessors.modified.get(file)).toEqual(new Date(2015, 0, 1));
    });

    it("leaves the file alone when no date can be found", async () => {
      const file = "/photos/random/holiday.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5, 9, 0, 0));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result).toEqual({ file, outcome: "unresolved", writes: [] });
    });

    it("compares against the modified time as read, not the corrected one", async () => {
      const file = "/photos/IMG_20260110_090000.jpg";
      accessors.modified.set(file, new Date(2030, 0, 1));

      const result = await makeReconciler(accessors, { fixFutureDates: 0 }).reconcile(file);

      expect(result.outcome).toBe("extracted-applied");
      expect(accessors.filesystemWrites).toEqual([
        { file, date: now },
        { file, date: new Date(2026, 0, 10, 9, 0, 0) },
      ]);
      expect(accessors.embeddedWrites).toEqual([{ file, date: new Date(2026, 0, 10, 9, 0, 0) }]);
    });

    it("never copies a corrected modified time into EXIF", async () => {
      const file = "/photos/IMG_20300105_080000.jpg";
      accessors.modified.set(file, new Date(2030, 0, 1));

      const result = await makeReconciler(accessors, { fixFutureDates: 0 }).reconcile(file);

      expect(result.outcome).toBe("unresolved");
      expect(accessors.filesystemWrites).toEqual([{ file, date: now }]);
      expect(accessors.embeddedWrites).toEqual([]);
    });
  });

  describe("files with an EXIF date", () => {
    it("keeps a plausible date", async () => {
      const file = "/photos/IMG_20190818_130841.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5));
      accessors.embedded.set(file, new Date(2018, 0, 1));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.outcome).toBe("embedded-kept");
      expect(accessors.embeddedWrites).toEqual([]);
      expect(accessors.filesystemWrites).toEqual([]);
    });

    it("raises a date before the floor", async () => {
      const file = "/photos/old.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5));
      accessors.embedded.set(file, new Date(1969, 11, 31));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.outcome).toBe("embedded-floored");
      expect(accessors.embeddedWrites).toEqual([{ file, date: EPOCH_FLOOR }]);
      expect(accessors.filesystemWrites).toEqual([]);
    });

    it("resets a future date to now when enabled", async () => {
      const file = "/photos/future.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5));
      accessors.embedded.set(file, new Date(2030, 0, 1));

      const result = await makeReconciler(accessors, { fixFutureDates: 1 }).reconcile(file);

      expect(result.outcome).toBe("embedded-future-fixed");
      expect(accessors.embeddedWrites).toEqual([{ file, date: now }]);
    });

    it("keeps a future date when the fix is disabled", async () => {
      const file = "/photos/future.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5));
      accessors.embedded.set(file, new Date(2030, 0, 1));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.outcome).toBe("embedded-kept");
      expect(accessors.embeddedWrites).toEqual([]);
    });
  });

  describe("modified time", () => {
    it("resets a future modified time beyond the horizon", async () => {
      const file = "/docs/notes.txt";
      accessors.modified.set(file, new Date(2030, 0, 1));

      const result = await makeReconciler(accessors, { fixFutureDates: 1 }).reconcile(file);

      expect(result.outcome).toBe("not-image");
      expect(accessors.filesystemWrites).toEqual([{ file, date: now }]);
    });

    it("keeps a modified time within the horizon", async () => {
      const file = "/docs/notes.txt";
      accessors.modified.set(file, new Date(2026, 0, 16, 0, 0, 0));

      const result = await makeReconciler(accessors, { fixFutureDates: 1 }).reconcile(file);

      expect(result.writes).toEqual([]);
    });

    it("raises a modified time before the floor", async () => {
      const file = "/docs/notes.txt";
      accessors.modified.set(file, new Date(1970, 0, 1));

      await makeReconciler(accessors).reconcile(file);

      expect(accessors.filesystemWrites).toEqual([{ file, date: EPOCH_FLOOR }]);
    });
  });

  describe("image detection", () => {
    it("does not read EXIF of non-images", async () => {
      const file = "/docs/report.pdf";
      accessors.modified.set(file, new Date(2024, 2, 5));

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.outcome).toBe("not-image");
      expect(accessors.embeddedReads).toEqual([]);
    });

    it("matches extensions case-insensitively", () => {
      const reconciler = makeReconciler(accessors);
      expect(reconciler.isImage("/photos/IMG_1.JPG")).toBe(true);
      expect(reconciler.isImage("/photos/README")).toBe(false);
      expect(reconciler.isImage("/photos/clip.mp4")).toBe(false);
    });
  });

  describe("dry run", () => {
    it("reports intended writes without performing them", async () => {
      const file = "/photos/IMG_20190818_130841.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5, 9, 0, 0));

      const result = await makeReconciler(accessors, { dryRun: true }).reconcile(file);

      expect(result.outcome).toBe("extracted-applied");
      expect(result.writes).toEqual([
        { target: "embedded", date: new Date(2019, 7, 18, 13, 8, 41), ok: true },
        { target: "filesystem", date: new Date(2019, 7, 18, 13, 8, 41), ok: true },
      ]);
      expect(accessors.embeddedWrites).toEqual([]);
      expect(accessors.filesystemWrites).toEqual([]);
    });

    it.each([
      {
        name: "future modified time",
        file: "/docs/notes.txt",
        modified: new Date(2030, 0, 1),
        embedded: undefined,
        outcome: "not-image",
        writes: [{ target: "filesystem", date: now, ok: true }],
      },
      {
        name: "modified time before the floor",
        file: "/docs/notes.txt",
        modified: new Date(1970, 0, 1),
        embedded: undefined,
        outcome: "not-image",
        writes: [{ target: "filesystem", date: EPOCH_FLOOR, ok: true }],
      },
      {
        name: "EXIF date before the floor",
        file: "/photos/old.jpg",
        modified: new Date(2024, 2, 5),
        embedded: new Date(1969, 11, 31),
        outcome: "embedded-floored",
        writes: [{ target: "embedded", date: EPOCH_FLOOR, ok: true }],
      },
      {
        name: "future EXIF date",
        file: "/photos/future.jpg",
        modified: new Date(2024, 2, 5),
        embedded: new Date(2030, 0, 1),
        outcome: "embedded-future-fixed",
        writes: [{ target: "embedded", date: now, ok: true }],
      },
      {
        name: "modified time matching the extracted year",
        file: "/photos/IMG_20190818_130841.jpg",
        modified: new Date(2019, 11, 1, 10, 0, 0),
        embedded: undefined,
        outcome: "embedded-from-filesystem",
        writes: [{ target: "embedded", date: new Date(2019, 11, 1, 10, 0, 0), ok: true }],
      },
    ])("writes nothing for a $name", async ({ file, modified, embedded, outcome, writes }) => {
      accessors.modified.set(file, modified);
      if (embedded) accessors.embedded.set(file, embedded);

      const result = await makeReconciler(accessors, { dryRun: true, fixFutureDates: 1 }).reconcile(file);

      expect(result.outcome).toBe(outcome);
      expect(result.writes).toEqual(writes);
      expect(accessors.embeddedWrites).toEqual([]);
      expect(accessors.filesystemWrites).toEqual([]);
      expect(accessors.modified.get(file)).toEqual(modified);
    });
  });

  describe("write failures", () => {
    it("records the failure and still sets the modified time", async () => {
      const file = "/photos/IMG_20190818_130841.jpg";
      accessors.modified.set(file, new Date(2024, 2, 5, 9, 0, 0));
      accessors.failEmbeddedWrites = true;

      const result = await makeReconciler(accessors).reconcile(file);

      expect(result.writes).toEqual([
        { target: "embedded", date: new Date(2019, 7, 18, 13, 8, 41), ok: false },
        { target: "filesystem", date: new Date(2019, 7, 18, 13, 8, 41), ok: true },
      ]);
    });

    it("propagates a failure to read the modified time", async () => {
      await expect(makeReconciler(accessors).reconcile("/missing.jpg")).rejects.toThrow("ENOENT");
    });
  });
});
