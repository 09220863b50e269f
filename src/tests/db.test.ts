/**
 * Snapshot reads on a single pool client
 */
import { describe, it, expect } from "vitest";
import { readInSnapshot } from "../lib/db.js";

class RecordingClient {
  log: string[] = [];

  async query(text: string): Promise<unknown> {
    this.log.push(text);
    return { rows: [] };
  }

  release(): void {
    this.log.push("release");
  }
}

async function* pages(client: RecordingClient, count: number, failAt?: number): AsyncIterable<number> {
  for (let page = 0; page < count; page++) {
    if (page === failAt) throw new Error("query failed");
    await client.query(`SELECT page ${page}`);
    yield page;
  }
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

describe("readInSnapshot", () => {
  it("reads every page inside one repeatable read transaction", async () => {
    const client = new RecordingClient();
    let connects = 0;

    const result = await collect(
      readInSnapshot(
        async () => {
          connects++;
          return client;
        },
        (c) => pages(c, 2)
      )
    );

    expect(result).toEqual([0, 1]);
    expect(connects).toBe(1);
    expect(client.log).toEqual([
      "BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY",
      "SELECT page 0",
      "SELECT page 1",
      "COMMIT",
      "release",
    ]);
  });

  it("rolls back and rethrows when a page fails", async () => {
    const client = new RecordingClient();

    await expect(collect(readInSnapshot(async () => client, (c) => pages(c, 3, 1)))).rejects.toThrow("query failed");

    expect(client.log).toEqual([
      "BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY",
      "SELECT page 0",
      "ROLLBACK",
      "release",
    ]);
  });

  it("ends the transaction when the reader stops early", async () => {
    const client = new RecordingClient();

    for await (const page of readInSnapshot(async () => client, (c) => pages(c, 3))) {
      if (page === 0) break;
    }

    expect(client.log).toEqual([
      "BEGIN ISOLATION LEVEL REPEATABLE READ READ ONLY",
      "SELECT page 0",
      "ROLLBACK",
      "release",
    ]);
  });
});
