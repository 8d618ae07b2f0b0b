import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConflictError, NotFoundError, ValidationError } from "@docboard/errors";
import { InProcessTaskQueue } from "@docboard/queue";
import { DOCUMENT_METADATA_KEYS, FILE_METADATA_KEYS } from "@docboard/types";
import { DocumentService, STORAGE_MISSING_MESSAGE } from "./document-service.js";
import { createTaskHandlers } from "./tasks/index.js";
import { UploadCoordinator } from "./upload-coordinator.js";
import { FIXED_NOW, createHarness, seedDocument, seedFile, type Harness } from "./test-support.js";

describe("DocumentService", () => {
  let h: Harness;
  let queue: InProcessTaskQueue;
  let service: DocumentService;

  beforeEach(async () => {
    h = await createHarness();
    const handlers = createTaskHandlers({
      uow: h.uow,
      store: h.store,
      staging: h.staging,
      lifecycle: h.lifecycle,
      chunking: { chunkSize: 512, overlap: 50 },
      logger: h.logger,
      clock: h.clock,
    });
    queue = new InProcessTaskQueue({ handlers, paused: true });
    service = new DocumentService({
      uow: h.uow,
      store: h.store,
      staging: h.staging,
      tasks: queue,
      lifecycle: h.lifecycle,
      logger: h.logger,
      clock: h.clock,
    });
  });

  afterEach(async () => {
    await h.dispose();
  });

  describe("review", () => {
    it("approves once and leaves an approved document untouched", async () => {
      const doc = await seedDocument(h.uow);

      const approved = await service.approve(doc.id, "admin-1");
      expect(approved.status).toBe("approved");
      expect(approved.metadata).toEqual({
        [DOCUMENT_METADATA_KEYS.APPROVED_BY]: "admin-1",
        [DOCUMENT_METADATA_KEYS.APPROVED_AT]: FIXED_NOW.toISOString(),
      });

      const updateSpy = vi.spyOn(h.uow.repos.documents, "update");
      const again = await service.approve(doc.id, "admin-2");
      expect(again.metadata[DOCUMENT_METADATA_KEYS.APPROVED_BY]).toBe("admin-1");
      expect(updateSpy).not.toHaveBeenCalled();
    });

    it("returns a rejected document to pending approval", async () => {
      const doc = await seedDocument(h.uow, { status: "approved" });

      const rejected = await service.reject(doc.id, "admin-1", "Missing appendix");

      expect(rejected.status).toBe("pending-approval");
      expect(rejected.metadata).toMatchObject({
        [DOCUMENT_METADATA_KEYS.REJECT_REASON]: "Missing appendix",
        [DOCUMENT_METADATA_KEYS.REJECTED_BY]: "admin-1",
      });
    });

    it("reports per-document outcomes for batch approval", async () => {
      const first = await seedDocument(h.uow);
      const second = await seedDocument(h.uow);

      const result = await service.approveMany([first.id, "missing", second.id], "admin-1");

      expect(result).toEqual({
        succeeded: [first.id, second.id],
        failed: [{ id: "missing", reason: "Document missing not found" }],
      });
      expect((await h.uow.repos.documents.findById(second.id))?.metadata).toMatchObject({
        [DOCUMENT_METADATA_KEYS.BATCH_APPROVAL]: true,
      });
    });

    it("marks batch rejections", async () => {
      const doc = await seedDocument(h.uow, { status: "approved" });

      const result = await service.rejectMany([doc.id], "admin-1");

      expect(result).toEqual({ succeeded: [doc.id], failed: [] });
      const stored = await h.uow.repos.documents.findById(doc.id);
      expect(stored?.status).toBe("pending-approval");
      expect(stored?.metadata).toMatchObject({ [DOCUMENT_METADATA_KEYS.BATCH_REJECTION]: true });
      expect(stored?.metadata).not.toHaveProperty(DOCUMENT_METADATA_KEYS.REJECT_REASON);
    });

    it("refuses an empty batch", async () => {
      await expect(service.approveMany([], "admin-1")).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe("requestVectorize", () => {
    it("enqueues a vectorize task and remembers its id", async () => {
      const doc = await seedDocument(h.uow);
      await seedFile(h.uow, doc.id);
      await h.uow.repos.documents.update(doc.id, { vectorized: true });

      const taskId = await service.requestVectorize(doc.id, "admin-1", { full: true });

      const info = await queue.getStatus(taskId);
      expect(info?.kind).toBe("vectorize");
      expect(info?.status).toBe("PENDING");
      const stored = await h.uow.repos.documents.findById(doc.id);
      expect(stored?.vectorized).toBe(false);
      expect(stored?.metadata).toEqual({
        [DOCUMENT_METADATA_KEYS.VECTORIZE_REQUESTED_BY]: "admin-1",
        [DOCUMENT_METADATA_KEYS.VECTORIZE_REQUESTED_AT]: FIXED_NOW.toISOString(),
        [DOCUMENT_METADATA_KEYS.FULL_VECTORIZE]: true,
        [DOCUMENT_METADATA_KEYS.FORCE_VECTORIZE]: false,
        [DOCUMENT_METADATA_KEYS.VECTORIZE_TASK_ID]: taskId,
      });
    });

    it("refuses an expired document unless forced", async () => {
      const doc = await seedDocument(h.uow, { endDate: new Date("2026-01-31T00:00:00.000Z") });
      await seedFile(h.uow, doc.id);

      await expect(service.requestVectorize(doc.id, "admin-1", { full: true })).rejects.toThrow(
        "Document has expired; force the request to vectorize anyway",
      );
      await expect(service.requestVectorize(doc.id, "admin-1", { full: true, force: true })).resolves.toEqual(
        expect.any(String),
      );
    });

    it("refuses a document that is not valid yet", async () => {
      const doc = await seedDocument(h.uow, { startDate: new Date("2026-06-01T00:00:00.000Z") });
      await seedFile(h.uow, doc.id);

      await expect(service.requestVectorize(doc.id, "admin-1", { full: true })).rejects.toThrow(
        "Document is not valid yet; force the request to vectorize anyway",
      );
    });

    it("needs files, and a summary for summary mode", async () => {
      const doc = await seedDocument(h.uow, { summary: "   " });

      await expect(service.requestVectorize(doc.id, "admin-1")).rejects.toThrow("Document has no files");

      await seedFile(h.uow, doc.id);
      await expect(service.requestVectorize(doc.id, "admin-1")).rejects.toThrow(
        "Document has no summary to vectorize",
      );
    });

    it("records an enqueue failure on the document", async () => {
      const doc = await seedDocument(h.uow, { summary: "Short summary." });
      await seedFile(h.uow, doc.id);
      vi.spyOn(queue, "enqueue").mockRejectedValueOnce(new Error("redis unavailable"));

      await expect(service.requestVectorize(doc.id, "admin-1")).rejects.toThrow("redis unavailable");
      expect((await h.uow.repos.documents.findById(doc.id))?.metadata).toMatchObject({
        [DOCUMENT_METADATA_KEYS.VECTORIZE_ERROR]: "redis unavailable",
        [DOCUMENT_METADATA_KEYS.ERROR_TIME]: FIXED_NOW.toISOString(),
      });
    });

    it("runs end to end once the queue drains", async () => {
      const doc = await seedDocument(h.uow, { summary: "The plan was approved. Work starts in May." });
      await seedFile(h.uow, doc.id);

      const taskId = await service.requestVectorize(doc.id, "admin-1");
      queue.resume();
      await queue.whenIdle();

      await expect(service.getTaskStatus(taskId)).resolves.toMatchObject({
        status: "SUCCESS",
        result: { documentId: doc.id, mode: "summary", chunkCount: 1, failedFiles: [] },
      });
      expect((await h.uow.repos.documents.findById(doc.id))?.vectorized).toBe(true);
    });
  });

  describe("requestVectorDelete", () => {
    it("stamps the request and enqueues a delete-vectors task", async () => {
      const doc = await seedDocument(h.uow);

      const taskId = await service.requestVectorDelete(doc.id, "admin-1");

      expect((await queue.getStatus(taskId))?.kind).toBe("delete-vectors");
      expect((await h.uow.repos.documents.findById(doc.id))?.metadata).toEqual({
        [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_REQUESTED_BY]: "admin-1",
        [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_REQUESTED_AT]: FIXED_NOW.toISOString(),
        [DOCUMENT_METADATA_KEYS.VECTOR_DELETE_TASK_ID]: taskId,
      });
    });
  });

  describe("removeFile", () => {
    it("clears vectorized and every chunk when the last file of a vectorized document goes", async () => {
      const doc = await seedDocument(h.uow, { summary: "Summary text." });
      const file = await seedFile(h.uow, doc.id);
      await h.store.put(file.storageKey, Buffer.from("body"), 4, "text/plain");
      await h.lifecycle.createChunksForFile(doc, file, ["one", "two"]);
      await h.lifecycle.createChunksForSummary(doc);
      await h.uow.repos.documents.update(doc.id, { vectorized: true });

      await service.removeFile(file.id);

      expect(await h.uow.repos.files.findById(file.id)).toBeNull();
      expect(await h.uow.repos.chunks.countByDocument(doc.id)).toBe(0);
      expect((await h.uow.repos.documents.findById(doc.id))?.vectorized).toBe(false);
      expect(h.backend.keys()).toEqual([]);
      expect(h.vectorStore.deletedBatches.flat()).toHaveLength(3);
    });

    it("keeps the document vectorized while other files remain", async () => {
      const doc = await seedDocument(h.uow);
      const first = await seedFile(h.uow, doc.id, { originalName: "a.txt" });
      const second = await seedFile(h.uow, doc.id, { originalName: "b.txt" });
      await h.lifecycle.createChunksForFile(doc, first, ["a"]);
      await h.lifecycle.createChunksForFile(doc, second, ["b"]);
      await h.uow.repos.documents.update(doc.id, { vectorized: true });

      await service.removeFile(first.id);

      expect(await h.uow.repos.chunks.countByDocument(doc.id)).toBe(1);
      expect((await h.uow.repos.documents.findById(doc.id))?.vectorized).toBe(true);
    });

    it("removes the row even when the stored object cannot be deleted", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id);
      vi.spyOn(h.backend, "deleteObject").mockRejectedValueOnce(new Error("access denied"));

      await service.removeFile(file.id);

      expect(await h.uow.repos.files.findById(file.id)).toBeNull();
    });

    it("fails for an unknown file", async () => {
      await expect(service.removeFile("missing")).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe("deleteDocument", () => {
    it("removes chunks, vectors, stored objects and rows", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id);
      await h.store.put(file.storageKey, Buffer.from("body"), 4, "text/plain");
      await h.lifecycle.createChunksForFile(doc, file, ["one"]);

      await service.deleteDocument(doc.id);

      expect(await h.uow.repos.documents.findById(doc.id)).toBeNull();
      expect(await h.uow.repos.files.findById(file.id)).toBeNull();
      expect(await h.uow.repos.chunks.countByDocument(doc.id)).toBe(0);
      expect(h.backend.keys()).toEqual([]);
      expect(h.vectorStore.deletedBatches).toHaveLength(1);
    });
  });

  describe("queries", () => {
    it("fails completed files whose object is missing from storage", async () => {
      const doc = await seedDocument(h.uow);
      const present = await seedFile(h.uow, doc.id, { originalName: "present.txt" });
      const missing = await seedFile(h.uow, doc.id, { originalName: "missing.txt" });
      const pending = await seedFile(h.uow, doc.id, { originalName: "pending.txt", processingStatus: "processing" });
      await h.store.put(present.storageKey, Buffer.from("here"), 4, "text/plain");

      const statuses = await service.getFileStatuses(doc.id);

      expect(statuses.map((f) => [f.id, f.processingStatus, f.errorMessage])).toEqual([
        [present.id, "completed", null],
        [missing.id, "failed", STORAGE_MISSING_MESSAGE],
        [pending.id, "processing", null],
      ]);
      expect((await h.uow.repos.files.findById(missing.id))?.metadata).toEqual({
        [FILE_METADATA_KEYS.STORAGE_MISSING_AT]: FIXED_NOW.toISOString(),
      });
    });

    it("reports unknown tasks as pending and revokes queued ones", async () => {
      await expect(service.getTaskStatus("never-seen")).resolves.toEqual({
        taskId: "never-seen",
        kind: null,
        status: "PENDING",
        result: null,
        error: null,
      });

      const doc = await seedDocument(h.uow);
      const taskId = await service.requestVectorDelete(doc.id, "admin-1");
      await expect(service.revokeTask(taskId)).resolves.toBe("REVOKED");
      await expect(service.getTaskStatus(taskId)).resolves.toMatchObject({ status: "REVOKED" });
    });

    it("fails a revoked upload that never started and drops its staged bytes", async () => {
      const doc = await seedDocument(h.uow);
      const coordinator = new UploadCoordinator({
        uow: h.uow,
        store: h.store,
        staging: h.staging,
        enqueuer: queue,
        logger: h.logger,
        clock: h.clock,
      });
      const [accepted] = await coordinator.acceptBatch(
        [{ originalName: "notes.txt", content: Buffer.from("hello") }],
        "owner-1",
        doc.id,
        { deferred: true },
      );
      const taskId = accepted?.taskId ?? "";
      const fileId = accepted?.fileId ?? "";
      const stagingPath = `${h.staging.dir}/${accepted?.storageKey ?? ""}`;

      await expect(service.revokeTask(taskId)).resolves.toBe("REVOKED");
      queue.resume();
      await queue.whenIdle();

      expect(queue.attemptsOf(taskId)).toBe(0);
      await expect(service.getTaskStatus(taskId)).resolves.toMatchObject({ status: "REVOKED" });
      const file = await h.uow.repos.files.findById(fileId);
      expect(file?.processingStatus).toBe("failed");
      expect(file?.errorMessage).toBe(`Task ${taskId} was revoked`);
      expect(file?.metadata).toMatchObject({
        [FILE_METADATA_KEYS.UPLOAD_ERROR]: `Task ${taskId} was revoked`,
        [FILE_METADATA_KEYS.REVOKED_AT]: FIXED_NOW.toISOString(),
      });
      await expect(h.staging.sizeOf(stagingPath)).resolves.toBeNull();

      const again = await coordinator.reupload(
        fileId,
        { originalName: "notes.txt", content: Buffer.from("hello") },
        "admin-1",
      );
      expect(again.status).toBe("processing");
      await queue.whenIdle();
      expect((await h.uow.repos.files.findById(fileId))?.processingStatus).toBe("completed");
    });

    it("leaves a file alone once a newer upload task owns it", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id, {
        processingStatus: "processing",
        metadata: { [FILE_METADATA_KEYS.TASK_ID]: "upload-new" },
      });
      const stagingPath = await h.staging.stage(file.storageKey, Buffer.from("fresh"));
      await queue.enqueue({
        kind: "upload",
        taskId: "upload-old",
        data: { stagingPath, storageKey: file.storageKey, documentId: doc.id, fileId: file.id },
      });

      await expect(service.revokeTask("upload-old")).resolves.toBe("REVOKED");

      expect((await h.uow.repos.files.findById(file.id))?.processingStatus).toBe("processing");
      await expect(h.staging.sizeOf(stagingPath)).resolves.toBe(5);
    });

    it("lists summary chunks before file chunks", async () => {
      const doc = await seedDocument(h.uow, { summary: "Summary." });
      const file = await seedFile(h.uow, doc.id);
      await h.lifecycle.createChunksForFile(doc, file, ["body 0", "body 1"]);
      await h.lifecycle.createChunksForSummary(doc);

      const chunks = await service.listChunks(doc.id);

      expect(chunks.map((c) => c.content)).toEqual(["Summary.", "body 0", "body 1"]);
    });
  });

  describe("downloads and views", () => {
    it("presigns a completed file and counts the download", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id, { storageKey: "f1.txt" });

      const link = await service.presignDownload(file.id, 60);

      expect(link).toEqual({
        url: "http://minio:9000/documents/f1.txt?X-Amz-Expires=60&X-Amz-Signature=memory",
        originalName: "notes.txt",
        contentType: "text/plain",
      });
      expect((await h.uow.repos.documents.findById(doc.id))?.downloadCount).toBe(1);
    });

    it("refuses files that are not completed", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id, { processingStatus: "failed" });

      await expect(service.presignDownload(file.id)).rejects.toBeInstanceOf(ConflictError);
    });

    it("counts views", async () => {
      const doc = await seedDocument(h.uow);

      await service.recordView(doc.id);
      const viewed = await service.recordView(doc.id);

      expect(viewed.viewCount).toBe(2);
    });
  });
});
