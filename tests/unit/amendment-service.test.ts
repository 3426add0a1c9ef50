import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  bulkUpdateAmendments,
  deleteAmendment,
  getAmendmentById,
  getAmendmentByReference,
  updateAmendment,
  updateAmendmentQa,
} from "../../src/routes/api-webapp/amendments/amendment/amendment-handler";
import { addProgress } from "../../src/routes/api-webapp/amendments/amendment-progress/amendment-progress-handler";
import { addAmendmentApplication } from "../../src/routes/api-webapp/amendments/amendment-application/amendment-application-handler";
import {
  getLinksForAmendment,
  linkAmendments,
} from "../../src/routes/api-webapp/amendments/amendment-link/amendment-link-handler";
import { getAmendmentStats } from "../../src/routes/api-webapp/amendments/dashboard/dashboard-handler";
import { Amendment } from "../../src/routes/api-webapp/amendments/amendment/amendment-model";
import { AmendmentProgress } from "../../src/routes/api-webapp/amendments/amendment-progress/amendment-progress-model";
import { AmendmentApplication } from "../../src/routes/api-webapp/amendments/amendment-application/amendment-application-model";
import { AmendmentLink } from "../../src/routes/api-webapp/amendments/amendment-link/amendment-link-model";
import { AmendmentDocument } from "../../src/routes/api-webapp/amendments/amendment-document/amendment-document-model";
import { Transaction } from "sequelize";
import {
  generateAmendmentReference,
  type ReferenceAllocator,
} from "../../src/routes/api-webapp/amendments/amendment-reference/amendment-reference-handler";
import { ConflictError, NotFoundError, ValidationFailureError } from "../../src/utils/app-errors";
import { dbInstance, fixedClock, insertAmendment, resetDatabase } from "../helpers/database";

const clock = fixedClock(new Date(2024, 4, 20, 8, 15));

describe("amendment service", () => {
  beforeEach(async () => {
    await resetDatabase();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  afterAll(async () => {
    await dbInstance.close();
  });

  describe("create", () => {
    it("applies workflow defaults and stamps the creator", async () => {
      const amendment = await insertAmendment({ description: "Totals wrong", createdBy: "tester" }, { clock });

      expect(amendment.amendmentReference).toBe("AMD-20240520-001");
      expect(amendment.amendmentStatus).toBe("Open");
      expect(amendment.developmentStatus).toBe("Not Started");
      expect(amendment.priority).toBe("Medium");
      expect(amendment.createdBy).toBe("tester");
      expect(amendment.dateReported).toEqual(new Date(2024, 4, 20, 8, 15));
      expect(amendment.qaCompleted).toBe(false);
    });

    it("keeps an explicit dateReported", async () => {
      const reported = new Date(2024, 0, 2, 12, 0);
      const amendment = await insertAmendment({ dateReported: reported }, { clock });
      expect(amendment.dateReported).toEqual(reported);
    });

    it("allocates again when the reference is already taken", async () => {
      const existing = await insertAmendment({}, { clock });
      const allocate = vi
        .fn<ReferenceAllocator>()
        .mockResolvedValueOnce(existing.amendmentReference)
        .mockResolvedValueOnce("AMD-20240520-002");

      const created = await insertAmendment({ description: "Second" }, { clock, allocateReference: allocate });

      expect(allocate).toHaveBeenCalledTimes(2);
      expect(created.amendmentReference).toBe("AMD-20240520-002");
      expect(await Amendment.count()).toBe(2);
    });

    it("re-reads with a locking query when another writer takes the reference first", async () => {
      const findOne = vi.spyOn(Amendment, "findOne");
      let competitorInserted = false;
      const allocate: ReferenceAllocator = async (options) => {
        const reference = await generateAmendmentReference(options);
        if (!competitorInserted) {
          competitorInserted = true;
          await Amendment.create(
            {
              amendmentReference: reference,
              amendmentType: "Bug",
              description: "Competing writer",
              force: null,
              application: null,
              notes: null,
              reportedBy: null,
              assignedTo: null,
              dateReported: null,
              releaseNotes: null,
              qaAssignedId: null,
              qaAssignedDate: null,
              qaSignature: null,
              qaCompletedDate: null,
              qaNotes: null,
              qaTestPlanLink: null,
              createdBy: null,
              modifiedBy: null,
            },
            { transaction: options?.transaction ?? null }
          );
        }
        return reference;
      };

      const created = await insertAmendment({ description: "Loser of the race" }, { clock, allocateReference: allocate });

      expect(created.amendmentReference).toBe("AMD-20240520-002");
      expect(await Amendment.count()).toBe(2);
      expect(findOne).toHaveBeenCalledWith(expect.objectContaining({ lock: Transaction.LOCK.UPDATE }));
    });

    it("gives up with a conflict after the configured attempts", async () => {
      const existing = await insertAmendment({}, { clock });
      const allocate = vi.fn<ReferenceAllocator>().mockResolvedValue(existing.amendmentReference);

      await expect(
        insertAmendment({ description: "Never stored" }, { clock, allocateReference: allocate, maxAttempts: 3 })
      ).rejects.toBeInstanceOf(ConflictError);

      expect(allocate).toHaveBeenCalledTimes(3);
      expect(await Amendment.count()).toBe(1);
    });
  });

  describe("read", () => {
    it("loads children with the amendment, newest progress first", async () => {
      const amendment = await insertAmendment({}, { clock });
      await dbInstance.transaction(async (t) => {
        await addProgress(amendment.id, { description: "Older", startDate: new Date(2024, 4, 1) }, t);
        await addProgress(amendment.id, { description: "Newer", startDate: new Date(2024, 4, 3) }, t);
        await addAmendmentApplication(amendment.id, { applicationName: "Core Platform", reportedVersion: "1.0" }, t);
      });

      const loaded = await getAmendmentById(amendment.id);
      expect(loaded.progressEntries?.map((entry) => entry.description)).toEqual(["Newer", "Older"]);
      expect(loaded.applications?.map((link) => link.applicationName)).toEqual(["Core Platform"]);
      expect(loaded.links).toEqual([]);
      expect(loaded.documents).toEqual([]);
    });

    it("finds by reference and reports missing records", async () => {
      const amendment = await insertAmendment({}, { clock });

      const byReference = await getAmendmentByReference("AMD-20240520-001");
      expect(byReference.id).toBe(amendment.id);

      await expect(getAmendmentById(999)).rejects.toBeInstanceOf(NotFoundError);
      await expect(getAmendmentByReference("AMD-20240520-999")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("update", () => {
    it("changes only the provided fields", async () => {
      const amendment = await insertAmendment(
        { description: "Original", notes: "keep me", priority: "Low" },
        { clock }
      );

      const updated = await dbInstance.transaction((t) =>
        updateAmendment(amendment.id, { priority: "High", modifiedBy: "editor" }, t)
      );

      expect(updated.priority).toBe("High");
      expect(updated.description).toBe("Original");
      expect(updated.notes).toBe("keep me");
      expect(updated.modifiedBy).toBe("editor");
      expect(updated.amendmentReference).toBe(amendment.amendmentReference);
    });

    it("bumps modifiedOn on an empty update", async () => {
      vi.useFakeTimers({ toFake: ["Date"] });
      vi.setSystemTime(new Date(2024, 4, 20, 9, 0, 0));
      const amendment = await insertAmendment({ description: "Untouched" }, { clock });
      const before = amendment.modifiedOn;

      vi.setSystemTime(new Date(2024, 4, 20, 10, 30, 0));
      await dbInstance.transaction((t) => updateAmendment(amendment.id, {}, t));

      const reloaded = await Amendment.findByPk(amendment.id);
      expect(reloaded?.description).toBe("Untouched");
      expect(before).toEqual(new Date(2024, 4, 20, 9, 0, 0));
      expect(reloaded?.modifiedOn).toEqual(new Date(2024, 4, 20, 10, 30, 0));
    });

    it("updates QA fields", async () => {
      const amendment = await insertAmendment({}, { clock });
      const updated = await dbInstance.transaction((t) =>
        updateAmendmentQa(amendment.id, { qaAssignedId: 7, qaCompleted: true, qaSignature: "QA Golf" }, t)
      );

      expect(updated.qaAssignedId).toBe(7);
      expect(updated.qaCompleted).toBe(true);
      expect(updated.qaSignature).toBe("QA Golf");
    });

    it("rejects an unknown id", async () => {
      await expect(
        dbInstance.transaction((t) => updateAmendment(404, { notes: "x" }, t))
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("bulk update", () => {
    it("updates each id independently and reports failures", async () => {
      const first = await insertAmendment({}, { clock });
      const second = await insertAmendment({}, { clock });

      const result = await bulkUpdateAmendments([first.id, 999, second.id], {
        amendmentStatus: "Testing",
        modifiedBy: "bulk",
      });

      expect(result.updatedCount).toBe(2);
      expect(result.failedIds).toEqual([999]);
      expect(result.errors).toEqual({ "999": "Amendment 999 not found" });
      expect((await Amendment.findByPk(first.id))?.amendmentStatus).toBe("Testing");
      expect((await Amendment.findByPk(second.id))?.modifiedBy).toBe("bulk");
    });
  });

  describe("delete", () => {
    it("removes the amendment's children only and returns document paths", async () => {
      const doomed = await insertAmendment({ description: "Doomed" }, { clock });
      const survivor = await insertAmendment({ description: "Survivor" }, { clock });

      await dbInstance.transaction(async (t) => {
        await addProgress(doomed.id, { description: "Doomed progress" }, t);
        await addProgress(survivor.id, { description: "Survivor progress" }, t);
        await addAmendmentApplication(doomed.id, { applicationName: "Core Platform" }, t);
        await linkAmendments(doomed.id, { linkedAmendmentId: survivor.id }, t);
        await linkAmendments(survivor.id, { linkedAmendmentId: doomed.id, linkType: "Blocks" }, t);
        await AmendmentDocument.create(
          {
            amendmentId: doomed.id,
            documentName: "plan",
            originalFilename: "plan.txt",
            filePath: `amendments/${doomed.id}/1-plan.txt`,
            fileSize: 4,
            mimeType: "text/plain",
            description: null,
            uploadedBy: null,
          },
          { transaction: t }
        );
      });

      const paths = await dbInstance.transaction((t) => deleteAmendment(doomed.id, t));

      expect(paths).toEqual([`amendments/${doomed.id}/1-plan.txt`]);
      expect(await Amendment.findByPk(doomed.id)).toBeNull();
      expect(await AmendmentProgress.count({ where: { amendmentId: doomed.id } })).toBe(0);
      expect(await AmendmentApplication.count({ where: { amendmentId: doomed.id } })).toBe(0);
      expect(await AmendmentDocument.count({ where: { amendmentId: doomed.id } })).toBe(0);
      expect(await AmendmentLink.count({ where: { amendmentId: doomed.id } })).toBe(0);

      expect(await AmendmentProgress.count({ where: { amendmentId: survivor.id } })).toBe(1);
      // incoming link from the survivor is left dangling
      const survivorLinks = await getLinksForAmendment(survivor.id);
      expect(survivorLinks).toHaveLength(1);
      expect(survivorLinks[0].linkedAmendmentId).toBe(doomed.id);
      expect(survivorLinks[0].linkedAmendment).toBeNull();
    });

    it("rolls back removed children when the amendment row cannot be deleted", async () => {
      const amendment = await insertAmendment({ description: "Sticky" }, { clock });
      await dbInstance.transaction(async (t) => {
        await addProgress(amendment.id, { description: "Still here" }, t);
        await addAmendmentApplication(amendment.id, { applicationName: "Core Platform" }, t);
      });
      vi.spyOn(Amendment.prototype, "destroy").mockRejectedValueOnce(new Error("row locked"));

      await expect(dbInstance.transaction((t) => deleteAmendment(amendment.id, t))).rejects.toThrow("row locked");

      expect(await Amendment.count({ where: { id: amendment.id } })).toBe(1);
      expect(await AmendmentProgress.count({ where: { amendmentId: amendment.id } })).toBe(1);
      expect(await AmendmentApplication.count({ where: { amendmentId: amendment.id } })).toBe(1);
    });

    it("reports a missing amendment", async () => {
      await expect(dbInstance.transaction((t) => deleteAmendment(12345, t))).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("links", () => {
    it("rejects a duplicate ordered pair but allows the reverse and self-links", async () => {
      const a = await insertAmendment({}, { clock });
      const b = await insertAmendment({}, { clock });

      const forward = await dbInstance.transaction((t) => linkAmendments(a.id, { linkedAmendmentId: b.id }, t));
      expect(forward.linkType).toBe("Related");

      await expect(
        dbInstance.transaction((t) => linkAmendments(a.id, { linkedAmendmentId: b.id, linkType: "Duplicate" }, t))
      ).rejects.toBeInstanceOf(ConflictError);

      const reverse = await dbInstance.transaction((t) =>
        linkAmendments(b.id, { linkedAmendmentId: a.id, linkType: "Blocked By" }, t)
      );
      expect(reverse.linkType).toBe("Blocked By");

      const self = await dbInstance.transaction((t) => linkAmendments(a.id, { linkedAmendmentId: a.id }, t));
      expect(self.linkedAmendmentId).toBe(a.id);

      expect(await AmendmentLink.count()).toBe(3);
    });

    it("requires both amendments to exist", async () => {
      const a = await insertAmendment({}, { clock });

      await expect(
        dbInstance.transaction((t) => linkAmendments(a.id, { linkedAmendmentId: 999 }, t))
      ).rejects.toBeInstanceOf(NotFoundError);
      await expect(
        dbInstance.transaction((t) => linkAmendments(999, { linkedAmendmentId: a.id }, t))
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("child records", () => {
    it("refuses children for a missing amendment", async () => {
      await expect(
        dbInstance.transaction((t) => addProgress(999, { description: "orphan" }, t))
      ).rejects.toBeInstanceOf(NotFoundError);
    });

    it("needs an application name or a catalogued id", async () => {
      const amendment = await insertAmendment({}, { clock });
      await expect(
        dbInstance.transaction((t) => addAmendmentApplication(amendment.id, { reportedVersion: "1.0" }, t))
      ).rejects.toBeInstanceOf(ValidationFailureError);
      await expect(
        dbInstance.transaction((t) => addAmendmentApplication(amendment.id, { applicationId: 55 }, t))
      ).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("statistics", () => {
    it("counts every enum value, zero when absent", async () => {
      await insertAmendment({ amendmentStatus: "Open", priority: "High", qaAssignedId: 3 }, { clock });
      await insertAmendment({ amendmentStatus: "Open", databaseChanges: true }, { clock });
      await insertAmendment(
        { amendmentType: "Bug", amendmentStatus: "Deployed", qaAssignedId: 3, qaCompleted: true },
        { clock }
      );

      const stats = await getAmendmentStats();

      expect(stats.total).toBe(3);
      expect(stats.byStatus).toEqual({ Open: 2, "In Progress": 0, Testing: 0, Completed: 0, Deployed: 1 });
      expect(stats.byPriority).toEqual({ Low: 0, Medium: 2, High: 1, Critical: 0 });
      expect(stats.byType.Fault).toBe(2);
      expect(stats.byType.Bug).toBe(1);
      expect(stats.byType.Documentation).toBe(0);
      expect(stats.byDevelopmentStatus["Not Started"]).toBe(3);
      expect(stats.qaPending).toBe(1);
      expect(stats.databaseChangesCount).toBe(1);
    });
  });
});
