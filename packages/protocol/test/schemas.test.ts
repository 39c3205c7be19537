import { describe, it } from "node:test";
import assert from "node:assert";
import {
  ClientToServerMessageSchema,
  FileAddedMessageSchema,
  ServerToClientMessageSchema,
  TextUpdateMessageSchema,
} from "../src/schemas";

const fileId = "9b2f6c1e-4d3a-4b5c-8d7e-0f1a2b3c4d5e";

describe("ClientToServerMessageSchema", () => {
  it("should accept a text submission", () => {
    const parsed = ClientToServerMessageSchema.safeParse({
      type: "text",
      content: "hello",
      version: 0,
    });

    assert.ok(parsed.success);
    assert.deepStrictEqual(parsed.data, { type: "text", content: "hello", version: 0 });
  });

  it("should reject a negative version", () => {
    const parsed = ClientToServerMessageSchema.safeParse({
      type: "text",
      content: "hello",
      version: -1,
    });

    assert.strictEqual(parsed.success, false);
  });

  it("should reject a fractional version", () => {
    const parsed = ClientToServerMessageSchema.safeParse({
      type: "text",
      content: "hello",
      version: 1.5,
    });

    assert.strictEqual(parsed.success, false);
  });

  it("should accept file_meta_request, clear and heartbeat without extra fields", () => {
    assert.ok(ClientToServerMessageSchema.safeParse({ type: "file_meta_request" }).success);
    assert.ok(ClientToServerMessageSchema.safeParse({ type: "clear" }).success);
    assert.ok(ClientToServerMessageSchema.safeParse({ type: "heartbeat" }).success);
  });

  it("should require a UUID for file_delete", () => {
    assert.ok(ClientToServerMessageSchema.safeParse({ type: "file_delete", id: fileId }).success);
    assert.strictEqual(
      ClientToServerMessageSchema.safeParse({ type: "file_delete", id: "../etc/passwd" }).success,
      false,
    );
  });

  it("should reject unknown message types", () => {
    const parsed = ClientToServerMessageSchema.safeParse({ type: "paste" });
    assert.strictEqual(parsed.success, false);
  });

  it("should carry an optional sender name with text", () => {
    const parsed = ClientToServerMessageSchema.safeParse({
      type: "text",
      content: "hello",
      version: 0,
      senderName: "Desk",
    });

    assert.ok(parsed.success);
    assert.deepStrictEqual(parsed.data, { type: "text", content: "hello", version: 0, senderName: "Desk" });
  });

  it("should reject a sender name that is not a string", () => {
    const parsed = ClientToServerMessageSchema.safeParse({
      type: "text",
      content: "hello",
      version: 0,
      senderName: 42,
    });

    assert.strictEqual(parsed.success, false);
  });
});

describe("ServerToClientMessageSchema", () => {
  it("should allow a null author before the first text update", () => {
    const parsed = TextUpdateMessageSchema.safeParse({
      type: "text_update",
      content: "",
      version: 0,
      updatedBy: null,
      updatedAt: 0,
    });

    assert.ok(parsed.success);
  });

  it("should keep the author name on text updates", () => {
    const message = {
      type: "text_update",
      content: "hi",
      version: 1,
      updatedBy: "client-a",
      updatedByName: "Desk",
      updatedAt: 5,
    };

    assert.deepStrictEqual(TextUpdateMessageSchema.parse(message), message);
  });

  it("should parse file_added with metadata only", () => {
    const message = {
      type: "file_added",
      id: fileId,
      filename: "notes.txt",
      mimeType: "text/plain",
      sizeBytes: 10,
      uploadedAt: 1000,
      expiresAt: 3_601_000,
    };

    assert.deepStrictEqual(FileAddedMessageSchema.parse(message), message);
    assert.ok(ServerToClientMessageSchema.safeParse(message).success);
  });

  it("should parse presence counts", () => {
    const parsed = ServerToClientMessageSchema.parse({ type: "presence", count: 2 });
    assert.deepStrictEqual(parsed, { type: "presence", count: 2 });
  });
});
