import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { ConflictError, NotFoundError, ValidationError } from "@docboard/errors";
import { InProcessTaskQueue, type TaskEnqueuer } from "@docboard/queue";
import { FILE_METADATA_KEYS, type IncomingFile } from "@docboard/types";
import { createTaskHandlers } from "./tasks/index.js";
import { UploadCoordinator } from "./upload-coordinator.js";
import { createHarness, seedDocument, seedFile, type Harness } from "./test-support.js";

const MB = 1024 * 1024;

function incoming(originalName: string, text = `contents of ${originalName}`): IncomingFile {
  return { originalName, content: Buffer.from(text) };
}

describe("UploadCoordinator", () => {
  let h: Harness;
  let enqueue: Mock<TaskEnqueuer["enqueue"]>;
  let coordinator: UploadCoordinator;

  beforeEach(async () => {
    h = await createHarness();
    enqueue = vi.fn<TaskEnqueuer["enqueue"]>(async (request) => request.taskId ?? "generated");
    coordinator = new UploadCoordinator({
      uow: h.uow,
      store: h.store,
      staging: h.staging,
      enqueuer: { enqueue },
      logger: h.logger,
      clock: h.clock,
      uploadRetry: { maxAttempts: 2, delayMs: 0 },
    });
  });

  afterEach(async () => {
    await h.dispose();
  });

  describe("validation", () => {
    it("rejects a disallowed extension before any write", async () => {
      const doc = await seedDocument(h.uow);
      const putSpy = vi.spyOn(h.backend, "putObject");

      await expect(
        coordinator.acceptBatch([incoming("report.pdf"), incoming("setup.exe")], "owner-1", doc.id, {
          deferred: true,
        }),
      ).rejects.toBeInstanceOf(ValidationError);

      expect(await h.uow.repos.files.countByDocument(doc.id)).toBe(0);
      expect(putSpy).not.toHaveBeenCalled();
      expect(enqueue).not.toHaveBeenCalled();
    });

    it("rejects an empty batch", async () => {
      const doc = await seedDocument(h.uow);

      await expect(coordinator.acceptBatch([], "owner-1", doc.id, { deferred: false })).rejects.toThrow(
        "No files provided",
      );
    });

    it("rejects an empty file", async () => {
      const doc = await seedDocument(h.uow);

      await expect(
        coordinator.acceptBatch([incoming("empty.txt", "")], "owner-1", doc.id, { deferred: false }),
      ).rejects.toThrow("File is empty: empty.txt");
    });

    it("rejects a file over its type's size limit", async () => {
      const doc = await seedDocument(h.uow);
      const big: IncomingFile = { originalName: "big.txt", content: Buffer.alloc(10 * MB + 1, 97) };

      await expect(coordinator.acceptBatch([big], "owner-1", doc.id, { deferred: false })).rejects.toThrow(
        "File exceeds the 10MB limit for .txt: big.txt",
      );
      expect(await h.uow.repos.files.countByDocument(doc.id)).toBe(0);
    });

    it("requires the document in deferred mode", async () => {
      await expect(
        coordinator.acceptBatch([incoming("a.txt")], "owner-1", "missing-doc", { deferred: true }),
      ).rejects.toBeInstanceOf(NotFoundError);
      expect(enqueue).not.toHaveBeenCalled();
    });
  });

  describe("deferred mode", () => {
    it("stages each file and enqueues one upload task per file", async () => {
      const doc = await seedDocument(h.uow);

      const results = await coordinator.acceptBatch(
        [incoming("report.pdf"), incoming("notes.txt")],
        "owner-1",
        doc.id,
        { deferred: true },
      );

      expect(results.map((r) => [r.originalName, r.status, r.error])).toEqual([
        ["report.pdf", "processing", null],
        ["notes.txt", "processing", null],
      ]);
      expect(results[0]?.storageKey).toMatch(/^[0-9a-f-]{36}\.pdf$/);
      expect(results[1]?.storageKey).toMatch(/^[0-9a-f-]{36}\.txt$/);
      expect(enqueue).toHaveBeenCalledTimes(2);

      const first = results[0];
      const row = await h.uow.repos.files.findById(first?.fileId ?? "");
      expect(row?.metadata).toEqual({
        [FILE_METADATA_KEYS.UPLOAD_TYPE]: "async",
        [FILE_METADATA_KEYS.UPLOADED_BY]: "owner-1",
        [FILE_METADATA_KEYS.TASK_ID]: first?.taskId,
      });
      expect(enqueue).toHaveBeenNthCalledWith(1, {
        kind: "upload",
        taskId: first?.taskId,
        data: {
          stagingPath: `${h.staging.dir}/${first?.storageKey ?? ""}`,
          storageKey: first?.storageKey,
          documentId: doc.id,
          fileId: first?.fileId,
        },
      });
    });

    it("keeps the first of several files with the same name", async () => {
      const doc = await seedDocument(h.uow);

      const results = await coordinator.acceptBatch(
        [incoming("a.txt", "first"), incoming("a.txt", "second copy"), incoming("b.txt")],
        "owner-1",
        doc.id,
        { deferred: true },
      );

      expect(results.map((r) => r.originalName)).toEqual(["a.txt", "b.txt"]);
      expect((await h.uow.repos.files.findById(results[0]?.fileId ?? ""))?.fileSize).toBe(5);
    });

    it("marks a file failed when its task cannot be enqueued and carries on", async () => {
      const doc = await seedDocument(h.uow);
      enqueue.mockRejectedValueOnce(new Error("queue unavailable"));

      const results = await coordinator.acceptBatch(
        [incoming("a.txt"), incoming("b.txt")],
        "owner-1",
        doc.id,
        { deferred: true },
      );

      expect(results.map((r) => [r.status, r.taskId === null, r.error])).toEqual([
        ["failed", true, "queue unavailable"],
        ["processing", false, null],
      ]);
      const failed = await h.uow.repos.files.findById(results[0]?.fileId ?? "");
      expect(failed?.processingStatus).toBe("failed");
      expect(failed?.errorMessage).toBe("queue unavailable");
      await expect(h.staging.sizeOf(`${h.staging.dir}/${results[0]?.storageKey ?? ""}`)).resolves.toBeNull();
    });

    it("completes both files once the upload tasks have run", async () => {
      const doc = await seedDocument(h.uow);
      const handlers = createTaskHandlers({
        uow: h.uow,
        store: h.store,
        staging: h.staging,
        lifecycle: h.lifecycle,
        chunking: { chunkSize: 512, overlap: 50 },
        logger: h.logger,
        clock: h.clock,
        uploadRetry: { delayMs: 0 },
        verifyRetry: { delayMs: 0 },
      });
      const queue = new InProcessTaskQueue({ handlers, paused: true, concurrency: 2 });
      const pipeline = new UploadCoordinator({
        uow: h.uow,
        store: h.store,
        staging: h.staging,
        enqueuer: queue,
        logger: h.logger,
      });
      const files = [incoming("report.pdf", "%PDF-1.4 quarterly numbers"), incoming("notes.txt", "meeting notes")];

      const results = await pipeline.acceptBatch(files, "owner-1", doc.id, { deferred: true });

      const taskIds = results.map((r) => r.taskId);
      expect(new Set(taskIds).size).toBe(2);
      for (const result of results) {
        expect((await h.uow.repos.files.findById(result.fileId))?.processingStatus).toBe("processing");
        expect((await queue.getStatus(result.taskId ?? ""))?.status).toBe("PENDING");
      }

      queue.resume();
      await queue.whenIdle();

      for (const [index, result] of results.entries()) {
        expect((await queue.getStatus(result.taskId ?? ""))?.status).toBe("SUCCESS");
        const row = await h.uow.repos.files.findById(result.fileId);
        expect(row?.processingStatus).toBe("completed");
        const stored = await h.store.stat(result.storageKey);
        expect(stored?.size).toBe(files[index]?.content.length);
        await expect(h.staging.sizeOf(`${h.staging.dir}/${result.storageKey}`)).resolves.toBeNull();
      }
      await queue.close();
    });
  });

  describe("sync mode", () => {
    it("uploads inline and completes the file", async () => {
      const doc = await seedDocument(h.uow);

      const [result] = await coordinator.acceptBatch([incoming("notes.txt", "hello")], "owner-1", doc.id, {
        deferred: false,
      });

      expect(result).toMatchObject({ status: "completed", taskId: null, error: null });
      const row = await h.uow.repos.files.findById(result?.fileId ?? "");
      expect(row?.processingStatus).toBe("completed");
      expect(row?.metadata).toMatchObject({
        [FILE_METADATA_KEYS.UPLOAD_TYPE]: "sync",
        [FILE_METADATA_KEYS.FILE_SIZE]: 5,
        [FILE_METADATA_KEYS.CONTENT_TYPE]: "text/plain",
        [FILE_METADATA_KEYS.UPLOAD_ATTEMPTS]: 1,
      });
      expect((await h.store.stat(result?.storageKey ?? ""))?.size).toBe(5);
      expect(enqueue).not.toHaveBeenCalled();
    });

    it("marks the file failed after the retries run out", async () => {
      const doc = await seedDocument(h.uow);
      const putSpy = vi.spyOn(h.backend, "putObject").mockRejectedValue(new Error("connection reset"));

      const [result] = await coordinator.acceptBatch([incoming("notes.txt")], "owner-1", doc.id, {
        deferred: false,
      });

      expect(putSpy).toHaveBeenCalledTimes(2);
      expect(result?.status).toBe("failed");
      expect(result?.error).toBe(`Failed to store object ${result?.storageKey ?? ""}`);
      const row = await h.uow.repos.files.findById(result?.fileId ?? "");
      expect(row?.processingStatus).toBe("failed");
      expect(row?.metadata[FILE_METADATA_KEYS.UPLOAD_ERROR]).toBe(result?.error);
    });

    it("falls back to no document when the id does not resolve", async () => {
      const [result] = await coordinator.acceptBatch([incoming("notes.txt")], "owner-1", "missing-doc", {
        deferred: false,
      });

      const row = await h.uow.repos.files.findById(result?.fileId ?? "");
      expect(row?.documentId).toBeNull();
      expect(row?.processingStatus).toBe("completed");
    });
  });

  describe("reupload", () => {
    it("moves a failed file back to processing and enqueues a new task", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id, {
        originalName: "notes.txt",
        storageKey: "abc.txt",
        processingStatus: "failed",
      });
      await h.uow.repos.files.update(file.id, { errorMessage: "Stored size mismatch" });

      const result = await coordinator.reupload(file.id, incoming("notes.txt", "fixed"), "admin-1");

      expect(result).toMatchObject({ fileId: file.id, storageKey: "abc.txt", status: "processing" });
      const row = await h.uow.repos.files.findById(file.id);
      expect(row?.processingStatus).toBe("processing");
      expect(row?.errorMessage).toBeNull();
      expect(row?.metadata).toMatchObject({
        [FILE_METADATA_KEYS.REUPLOADED_BY]: "admin-1",
        [FILE_METADATA_KEYS.ORIGINAL_ERROR]: "Stored size mismatch",
        [FILE_METADATA_KEYS.REUPLOAD_TASK_ID]: result.taskId,
      });
      expect(enqueue).toHaveBeenCalledWith(
        expect.objectContaining({ kind: "upload", taskId: result.taskId }),
      );
      await expect(h.staging.sizeOf(`${h.staging.dir}/abc.txt`)).resolves.toBe(5);
    });

    it("refuses files that have not failed", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id, { processingStatus: "completed" });

      await expect(coordinator.reupload(file.id, incoming("notes.txt"), "admin-1")).rejects.toBeInstanceOf(
        ConflictError,
      );
    });

    it("refuses a different file name", async () => {
      const doc = await seedDocument(h.uow);
      const file = await seedFile(h.uow, doc.id, { processingStatus: "failed" });

      await expect(coordinator.reupload(file.id, incoming("other.txt"), "admin-1")).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });
});
