import { describe, expect, it } from "vitest";

import {
  parseDocument,
  prepareMessageDocument,
  prepareRoomDocument,
  prepareUserDocument,
} from "@/server/search/documents";
import { isSearchServiceError } from "@/server/search/errors";

const NOW = new Date("2026-05-10T08:30:00.000Z");

describe("prepareMessageDocument", () => {
  it("generates an id when none is supplied", () => {
    const first = prepareMessageDocument({ content: "hi there", userId: "u1", roomId: "r1" }, NOW);
    const second = prepareMessageDocument({ content: "hi there", userId: "u1", roomId: "r1" }, NOW);

    expect(first.messageId).not.toBe(second.messageId);
    expect(first.timestamp).toBe("2026-05-10T08:30:00.000Z");
  });

  it("keeps metadata and falls back to the default type for blank types", () => {
    const document = prepareMessageDocument(
      { id: "m1", content: "hi", userId: "u1", roomId: "r1", type: " ", metadata: { edited: true } },
      NOW,
    );

    expect(document.messageType).toBe("text");
    expect(document.metadata).toEqual({ edited: true });
  });

  it("lists every missing field", () => {
    try {
      prepareMessageDocument({ content: "hi" }, NOW);
      expect.unreachable();
    } catch (error) {
      expect(isSearchServiceError(error, "missing_field")).toBe(true);
      expect(error).toMatchObject({
        message: "Cannot index messages document: missing or invalid userId, roomId",
        data: { domain: "messages", fields: ["userId", "roomId"] },
      });
    }
  });

  it("rejects non-object input", () => {
    expect(() => prepareMessageDocument(null, NOW)).toThrow(
      "Cannot index messages document: missing or invalid document",
    );
  });
});

describe("prepareUserDocument", () => {
  it("trims the user id", () => {
    expect(prepareUserDocument({ id: " u1 ", username: "anna", email: "anna@example.com" })).toEqual({
      userId: "u1",
      username: "anna",
      email: "anna@example.com",
      metadata: {},
    });
  });
});

describe("prepareRoomDocument", () => {
  it("requires a member list", () => {
    expect(() => prepareRoomDocument({ id: "r1", name: "General" })).toThrow(
      "Cannot index rooms document: missing or invalid members",
    );
  });
});

describe("parseDocument", () => {
  it("drops unknown fields such as stored vectors", () => {
    const parsed = parseDocument("messages", {
      messageId: "m1",
      content: "hi",
      userId: "u1",
      roomId: "r1",
      timestamp: "2026-05-10T08:30:00.000Z",
      messageType: "text",
      content_vector: [0.1, 0.2],
    });

    expect(parsed).toEqual({
      messageId: "m1",
      content: "hi",
      userId: "u1",
      roomId: "r1",
      timestamp: "2026-05-10T08:30:00.000Z",
      messageType: "text",
      metadata: {},
    });
  });

  it("returns null for documents of the wrong shape", () => {
    expect(parseDocument("rooms", { roomId: "r1", name: "General", members: "u1" })).toBeNull();
  });
});
