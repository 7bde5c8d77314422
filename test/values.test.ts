import { describe, it, expect } from "vitest";

import { CommitOrChangeId, HexIdIndex, ShortestIdPrefix } from "../src/values/ids";
import { emailUsername, formatTimestamp, formatTimestampRelativeTo } from "../src/values/time";

describe("ids", () => {
  const index = new HexIdIndex(["abc123", "abd456", "ff0000"]);

  it("unique prefix length", () => {
    expect(index.shortestUniquePrefixLength("abc123")).toBe(3);
    expect(index.shortestUniquePrefixLength("ff0000")).toBe(1);
  });

  it("unique prefix length is capped at the id length", () => {
    const nested = new HexIdIndex(["ab", "abcd"]);
    expect(nested.shortestUniquePrefixLength("ab")).toBe(2);
  });

  it("unknown ids still get a prefix", () => {
    expect(new HexIdIndex([]).shortestUniquePrefixLength("1234")).toBe(1);
  });

  it("short", () => {
    const id = new CommitOrChangeId("abc123", index);
    expect(id.short(4)).toBe("abc1");
    expect(id.short(12)).toBe("abc123");
    expect(id.short(0)).toBe("");
  });

  it("shortest", () => {
    const id = new CommitOrChangeId("abc123", index);
    expect(id.shortest(0)).toEqual(new ShortestIdPrefix("abc", ""));
    expect(id.shortest(2)).toEqual(new ShortestIdPrefix("abc", ""));
    expect(id.shortest(5)).toEqual(new ShortestIdPrefix("abc", "12"));
    expect(id.shortest(100)).toEqual(new ShortestIdPrefix("abc", "123"));
  });

  it("with_brackets", () => {
    expect(new ShortestIdPrefix("abc", "12").withBrackets()).toBe("abc[12]");
    expect(new ShortestIdPrefix("abc", "").withBrackets()).toBe("abc");
  });
});

describe("signatures", () => {
  it("username is the part before @", () => {
    expect(emailUsername("test.user@example.com")).toBe("test.user");
    expect(emailUsername("a@b@c")).toBe("a");
    expect(emailUsername("nobody")).toBe("nobody");
  });
});

describe("timestamps", () => {
  const instant = Date.UTC(2023, 0, 15, 9, 30, 0, 250);

  it("formats in the timestamp's own offset", () => {
    expect(formatTimestamp({ timestamp: instant, tzOffset: 60 })).toBe("2023-01-15 10:30:00.250 +01:00");
    expect(formatTimestamp({ timestamp: instant, tzOffset: 0 })).toBe("2023-01-15 09:30:00.250 +00:00");
    expect(formatTimestamp({ timestamp: instant, tzOffset: -330 })).toBe("2023-01-15 04:00:00.250 -05:30");
  });

  it("offset can cross a date boundary", () => {
    expect(formatTimestamp({ timestamp: Date.UTC(2023, 11, 31, 23, 0, 0, 0), tzOffset: 120 })).toBe(
      "2024-01-01 01:00:00.000 +02:00"
    );
  });

  describe("relative", () => {
    const now = Date.UTC(2023, 5, 1, 12, 0, 0, 0);
    const second = 1000;
    const hour = 60 * 60 * second;
    const day = 24 * hour;

    function ago(ms: number): string {
      return formatTimestampRelativeTo({ timestamp: now - ms, tzOffset: 0 }, now);
    }

    it("past", () => {
      expect(ago(2 * hour)).toBe("2 hours ago");
      expect(ago(second)).toBe("1 second ago");
      expect(ago(90 * second)).toBe("1 minute ago");
    });

    it("future", () => {
      expect(ago(-3 * day)).toBe("in 3 days");
    });

    it("picks the largest whole unit", () => {
      expect(ago(10 * day)).toBe("1 week ago");
      expect(ago(45 * day)).toBe("1 month ago");
      expect(ago(400 * day)).toBe("1 year ago");
    });

    it("under a second is now", () => {
      expect(ago(0)).toBe("now");
      expect(ago(500)).toBe("now");
    });
  });
});
