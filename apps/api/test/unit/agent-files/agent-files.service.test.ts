import { NotFoundException } from "@nestjs/common";
import { describe, expect, it } from "vitest";
import { AgentCatalogService } from "../../../src/agents/agent-catalog.service";
import { AgentFilesService } from "../../../src/agent-files/agent-files.service";
import {
  FakeFoundry,
  createLogger,
  createSessionStore,
  createSettings,
} from "../support/fakes";

const AGENT_ID = "asst_analyst";

const setup = () => {
  const foundry = new FakeFoundry();
  foundry.addAgent({ id: AGENT_ID, name: "Analyst", tools: [{ type: "code_interpreter" }] });
  const settings = createSettings();
  const store = createSessionStore(settings);
  const catalog = new AgentCatalogService(foundry.asClient(), settings, createLogger());
  const logger = createLogger();
  const service = new AgentFilesService(foundry.asClient(), catalog, store, logger);
  const session = store.resolve(undefined);
  return { foundry, catalog, store, service, session, logger };
};

const csv = (text: string) => new TextEncoder().encode(text);

describe("AgentFilesService.listFiles", () => {
  it("resolves metadata in attachment order", async () => {
    const { foundry, service } = setup();
    foundry.attach(AGENT_ID, [
      { id: "file-b", filename: "b.pdf", bytes: 20 },
      { id: "file-a", filename: "a.csv", bytes: 10 },
    ]);

    await expect(service.listFiles(AGENT_ID)).resolves.toEqual([
      { fileId: "file-b", filename: "b.pdf", bytes: 20, available: true },
      { fileId: "file-a", filename: "a.csv", bytes: 10, available: true },
    ]);
  });

  it("shows a placeholder row when metadata cannot be read", async () => {
    const { foundry, service, logger } = setup();
    foundry.attach(AGENT_ID, [{ id: "file-a", filename: "a.csv" }]);
    foundry.getFile.mockRejectedValueOnce(new Error("gone"));

    await expect(service.listFiles(AGENT_ID)).resolves.toEqual([
      { fileId: "file-a", filename: "(unavailable)", bytes: null, available: false },
    ]);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it("returns an empty list for agents without code interpreter files", async () => {
    const { service } = setup();

    await expect(service.listFiles(AGENT_ID)).resolves.toEqual([]);
  });
});

describe("AgentFilesService.deleteFile", () => {
  it("detaches exactly the deleted file and removes the file object", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [
      { id: "file-1", filename: "one.csv" },
      { id: "file-2", filename: "two.csv" },
      { id: "file-3", filename: "three.csv" },
    ]);

    const result = await service.deleteFile(session, AGENT_ID, "file-2");

    expect(foundry.fileIds(AGENT_ID)).toEqual(["file-1", "file-3"]);
    expect(foundry.deleteFile).toHaveBeenCalledWith("file-2");
    expect(result.files.map((file) => file.fileId)).toEqual(["file-1", "file-3"]);
    expect(result.warnings).toEqual([]);
    expect(session.logs.at(-1)?.message).toBe("Deleted two.csv from CI and project.");
  });

  it("keeps the detachment when the file object cannot be deleted", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [
      { id: "file-1", filename: "one.csv" },
      { id: "file-2", filename: "two.csv" },
    ]);
    foundry.deleteFile.mockRejectedValueOnce(new Error("locked"));

    const result = await service.deleteFile(session, AGENT_ID, "file-1");

    expect(foundry.fileIds(AGENT_ID)).toEqual(["file-2"]);
    expect(result.warnings).toEqual(["Could not delete file object file-1: locked"]);
    expect(session.logs.map((entry) => entry.level)).toEqual(["warn", "info"]);
  });

  it("rejects files that are not attached", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [{ id: "file-1", filename: "one.csv" }]);

    await expect(service.deleteFile(session, AGENT_ID, "file-9")).rejects.toBeInstanceOf(
      NotFoundException,
    );
    expect(foundry.setCodeInterpreterFileIds).not.toHaveBeenCalled();
    expect(session.logs.at(-1)?.level).toBe("error");
  });

  it("records and rethrows update failures", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [{ id: "file-1", filename: "one.csv" }]);
    foundry.setCodeInterpreterFileIds.mockRejectedValueOnce(new Error("conflict"));

    await expect(service.deleteFile(session, AGENT_ID, "file-1")).rejects.toThrow("conflict");
    expect(session.logs.at(-1)).toMatchObject({
      level: "error",
      message: "Delete failed: conflict",
    });
    expect(foundry.deleteFile).not.toHaveBeenCalled();
  });
});

describe("AgentFilesService.uploadAndPersist", () => {
  it("appends a new filename as one extra id", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [{ id: "file-1", filename: "one.csv" }]);

    const result = await service.uploadAndPersist(session, AGENT_ID, {
      filename: "two.csv",
      bytes: csv("a,b"),
    });

    expect(result).toMatchObject({
      fileId: "file-new-1",
      filename: "two.csv",
      outcome: "attached",
      warnings: [],
    });
    expect(result.replacedFileId).toBeUndefined();
    expect(foundry.fileIds(AGENT_ID)).toEqual(["file-1", "file-new-1"]);
    expect(session.lastUploadedFileId).toBe("file-new-1");
    expect(session.logs.map((entry) => entry.message)).toEqual([
      "Uploaded new file_id=file-new-1 for 'two.csv'.",
      "Persisted new file to CI: 'two.csv' id=file-new-1.",
    ]);
  });

  it("replaces data.csv in place when DATA.CSV is uploaded", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [
      { id: "f1", filename: "data.csv" },
      { id: "f2", filename: "chart.png" },
    ]);

    const result = await service.uploadAndPersist(session, AGENT_ID, {
      filename: "DATA.CSV",
      bytes: csv("x,y\n1,2"),
    });

    expect(foundry.uploadFile).toHaveBeenCalledWith({
      filename: "DATA.CSV",
      bytes: csv("x,y\n1,2"),
      purpose: "assistants",
    });
    expect(foundry.fileIds(AGENT_ID)).toEqual(["file-new-1", "f2"]);
    expect(foundry.deleteFile).toHaveBeenCalledWith("f1");
    expect(result).toMatchObject({ outcome: "replaced", replacedFileId: "f1" });
    expect(result.files).toEqual([
      { fileId: "file-new-1", filename: "DATA.CSV", bytes: 7, available: true },
      { fileId: "f2", filename: "chart.png", bytes: 10, available: true },
    ]);
    expect(session.logs.at(-1)?.message).toBe(
      "Overwritten: 'DATA.CSV' old_id=f1 -> new_id=file-new-1.",
    );
  });

  it("keeps length and position when the old file cannot be deleted", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [
      { id: "f1", filename: "intro.pdf" },
      { id: "f2", filename: "data.csv" },
      { id: "f3", filename: "chart.png" },
    ]);
    foundry.deleteFile.mockRejectedValueOnce(new Error("busy"));

    const result = await service.uploadAndPersist(session, AGENT_ID, {
      filename: "data.csv",
      bytes: csv("1"),
    });

    expect(foundry.fileIds(AGENT_ID)).toEqual(["f1", "file-new-1", "f3"]);
    expect(result.warnings).toEqual(["Could not delete file object f2: busy"]);
    expect(session.logs.map((entry) => entry.level)).toEqual(["info", "warn", "info"]);
  });

  it("collapses existing duplicates into the first matching slot", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [
      { id: "f1", filename: "other.pdf" },
      { id: "f2", filename: "Data.csv" },
      { id: "f3", filename: "data.CSV" },
    ]);

    const result = await service.uploadAndPersist(session, AGENT_ID, {
      filename: "data.csv",
      bytes: csv("1"),
    });

    expect(foundry.fileIds(AGENT_ID)).toEqual(["f1", "file-new-1"]);
    expect(foundry.deleteFile.mock.calls.map(([fileId]) => fileId)).toEqual(["f2", "f3"]);
    expect(result.replacedFileId).toBe("f2");
  });

  it("never matches placeholder rows", async () => {
    const { foundry, service, session } = setup();
    foundry.attach(AGENT_ID, [{ id: "f1", filename: "data.csv" }]);
    foundry.getFile.mockRejectedValueOnce(new Error("gone"));

    const result = await service.uploadAndPersist(session, AGENT_ID, {
      filename: "(unavailable)",
      bytes: csv("1"),
    });

    expect(result.outcome).toBe("attached");
    expect(foundry.fileIds(AGENT_ID)).toEqual(["f1", "file-new-1"]);
  });

  it("clears the agent cache after a change", async () => {
    const { foundry, catalog, service, session } = setup();
    await catalog.listAgents();

    await service.uploadAndPersist(session, AGENT_ID, { filename: "a.csv", bytes: csv("1") });
    await catalog.listAgents();

    expect(foundry.listAgents).toHaveBeenCalledTimes(2);
  });

  it("leaves the uploaded file in place when attaching fails", async () => {
    const { foundry, service, session } = setup();
    foundry.setCodeInterpreterFileIds.mockRejectedValueOnce(new Error("denied"));

    await expect(
      service.uploadAndPersist(session, AGENT_ID, { filename: "a.csv", bytes: csv("1") }),
    ).rejects.toThrow("denied");

    expect(foundry.files.has("file-new-1")).toBe(true);
    expect(session.lastUploadedFileId).toBe("file-new-1");
    expect(session.logs.at(-1)).toMatchObject({
      level: "error",
      message: "Persist/overwrite failed: denied",
    });
  });

  it("serializes concurrent uploads for the same agent", async () => {
    const { foundry, service, session } = setup();

    await Promise.all([
      service.uploadAndPersist(session, AGENT_ID, { filename: "a.csv", bytes: csv("1") }),
      service.uploadAndPersist(session, AGENT_ID, { filename: "b.csv", bytes: csv("2") }),
    ]);

    expect(foundry.fileIds(AGENT_ID)).toHaveLength(2);
    expect([...foundry.fileIds(AGENT_ID)].sort()).toEqual(["file-new-1", "file-new-2"]);
  });
});
