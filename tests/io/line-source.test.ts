/**
 * Tests for the stream-backed line source
 */

import { describe, test, expect } from "vitest";
import { Readable } from "node:stream";
import { StreamLineSource } from "../../src/io/line-source.ts";

function sourceOf(text: string): StreamLineSource {
  return new StreamLineSource(Readable.from([Buffer.from(text)]));
}

describe("StreamLineSource", () => {
  test("yields lines in order, then null", async () => {
    const source = sourceOf("first\nsecond\n");

    await expect(source.readLine()).resolves.toBe("first");
    await expect(source.readLine()).resolves.toBe("second");
    await expect(source.readLine()).resolves.toBeNull();
    await expect(source.readLine()).resolves.toBeNull();
    source.close();
  });

  test("strips CRLF terminators", async () => {
    const source = sourceOf("12\r\n34\r\n");

    await expect(source.readLine()).resolves.toBe("12");
    await expect(source.readLine()).resolves.toBe("34");
    source.close();
  });

  test("returns a final line without a terminator", async () => {
    const source = sourceOf("last");

    await expect(source.readLine()).resolves.toBe("last");
    await expect(source.readLine()).resolves.toBeNull();
    source.close();
  });

  test("reads nothing after close", async () => {
    const source = sourceOf("1\n2\n");

    source.close();
    await expect(source.readLine()).resolves.toBeNull();
  });
});
