import { describe, expect, it } from "vitest";
import { TimestampParseError } from "./errors.js";
import { parseInstant, toMessage, toRoom } from "./mappers.js";

describe("toRoom", () => {
  it("maps every documented channel key", () => {
    const room = toRoom({
      _id: "R1",
      name: "general",
      t: "c",
      u: { _id: "U1", username: "alice" },
      topic: "Daily chatter",
      description: "Company-wide channel",
      ro: true,
      default: true,
      ts: "2024-01-01T00:00:00Z",
      _updatedAt: "2024-02-03T04:05:06.789Z",
    });

    expect(room).toEqual({
      id: "R1",
      name: "general",
      kind: "c",
      creator: { id: "U1", username: "alice" },
      topic: "Daily chatter",
      description: "Company-wide channel",
      readOnly: true,
      isDefault: true,
      createdAt: new Date("2024-01-01T00:00:00Z"),
      updatedAt: new Date("2024-02-03T04:05:06.789Z"),
    });
    expect(room.createdAt?.getTime()).toBe(Date.UTC(2024, 0, 1));
  });

  it("leaves absent optional keys at their defaults", () => {
    const room = toRoom({ _id: "R2", name: "random", t: "p", ro: false });

    expect(room.topic).toBeNull();
    expect(room.description).toBeNull();
    expect(room.isDefault).toBe(false);
    expect(room.creator).toBeNull();
    expect(room.createdAt).toBeNull();
    expect(room.updatedAt).toBeNull();
  });

  it("treats null values like absent keys", () => {
    const room = toRoom({ _id: "R3", topic: null, ro: null, ts: null });

    expect(room.topic).toBeNull();
    expect(room.readOnly).toBe(false);
    expect(room.createdAt).toBeNull();
  });

  it("fails on an unparsable creation timestamp", () => {
    expect(() => toRoom({ _id: "R4", ts: "yesterday" })).toThrow(TimestampParseError);
  });

  it("fails on an unparsable update timestamp", () => {
    expect(() => toRoom({ _id: "R5", _updatedAt: 1704067200000 })).toThrow(
      'Invalid timestamp in "_updatedAt": 1704067200000',
    );
  });
});

describe("toMessage", () => {
  it("maps a plain message", () => {
    const message = toMessage({
      _id: "M1",
      rid: "R1",
      msg: "hi",
      ts: "2024-01-01T00:00:00Z",
      u: { _id: "U1", username: "alice", name: "Alice" },
    });

    expect(message).toEqual({
      id: "M1",
      roomId: "R1",
      body: "hi",
      timestamp: new Date("2024-01-01T00:00:00Z"),
      author: { id: "U1", username: "alice", name: "Alice" },
      attachments: [],
    });
  });

  it("leaves the author display name null when u.name is absent", () => {
    const message = toMessage({ _id: "M2", u: { _id: "U1", username: "alice" } });

    expect(message.author).toEqual({ id: "U1", username: "alice", name: null });
  });

  it("maps attachments with their defaults", () => {
    const message = toMessage({
      _id: "M3",
      attachments: [
        {
          title: "diagram.png",
          type: "file",
          description: "architecture",
          title_link: "/file-upload/F1/diagram.png",
          title_link_download: true,
          image_url: "/file-upload/F1/diagram.png",
          image_type: "image/png",
          image_size: 2048,
        },
        { title: "notes.txt" },
      ],
    });

    expect(message.attachments).toEqual([
      {
        title: "diagram.png",
        type: "file",
        description: "architecture",
        link: "/file-upload/F1/diagram.png",
        linkIsDownload: true,
        imageUrl: "/file-upload/F1/diagram.png",
        imageType: "image/png",
        imageSizeBytes: 2048,
      },
      {
        title: "notes.txt",
        type: null,
        description: null,
        link: null,
        linkIsDownload: false,
        imageUrl: null,
        imageType: null,
        imageSizeBytes: null,
      },
    ]);
  });
});

describe("toMessage timestamps", () => {
  it("fails on an unparsable message timestamp", () => {
    expect(() => toMessage({ _id: "M4", ts: "soon" })).toThrow(
      new TimestampParseError("ts", "soon"),
    );
  });

  it("fails on a numeric message timestamp", () => {
    expect(() => toMessage({ _id: "M4", ts: 1714557600000 })).toThrow(TimestampParseError);
  });
});

describe("parseInstant", () => {
  it("accepts offsets other than Z", () => {
    expect(parseInstant("2024-01-01T09:00:00+09:00", "ts")).toEqual(
      new Date("2024-01-01T00:00:00Z"),
    );
  });

  it("rejects a date without a time", () => {
    expect(() => parseInstant("2024-01-01", "ts")).toThrow(TimestampParseError);
  });
});
