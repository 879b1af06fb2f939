import { beforeEach, describe, expect, it } from "vitest";
import { InMemoryRepository } from "./in-memory.repository";

interface Note {
  text: string;
}

describe("InMemoryRepository", () => {
  const seededId = "0d4f2c44-1c1e-4d2b-9f60-5d1c2b8e7a11";
  let repository: InMemoryRepository<Note>;

  beforeEach(() => {
    repository = new InMemoryRepository<Note>([{ id: seededId, text: "seeded" }]);
  });

  it("lists the seed records", async () => {
    expect(await repository.list()).toEqual([{ id: seededId, text: "seeded" }]);
  });

  it("assigns a fresh id on add when none is given", async () => {
    const created = await repository.add({ text: "new" });

    expect(created.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(await repository.get(created.id)).toEqual({ id: created.id, text: "new" });
  });

  it("assigns a fresh id when the given id is empty", async () => {
    const created = await repository.add({ id: "", text: "blank id" });

    expect(created.id).not.toBe("");
  });

  it("keeps list order when a record is updated", async () => {
    const second = await repository.add({ text: "second" });

    await repository.update(seededId, { text: "changed" });

    expect(await repository.list()).toEqual([
      { id: seededId, text: "changed" },
      { id: second.id, text: "second" },
    ]);
  });

  it("returns null when updating or getting an unknown id", async () => {
    expect(await repository.update("missing", { text: "x" })).toBeNull();
    expect(await repository.get("missing")).toBeNull();
  });

  it("reports whether delete removed a record", async () => {
    expect(await repository.delete(seededId)).toBe(true);
    expect(await repository.delete(seededId)).toBe(false);
    expect(await repository.list()).toEqual([]);
  });

  it("hands out copies so callers cannot mutate stored records", async () => {
    const fetched = await repository.get(seededId);
    if (fetched) {
      fetched.text = "mutated";
    }

    expect(await repository.get(seededId)).toEqual({ id: seededId, text: "seeded" });
  });
});

describe("InMemoryRepository with nested records", () => {
  interface Basket {
    lines: Array<{ sku: string; quantity: number }>;
  }

  it("does not share nested arrays with callers", async () => {
    const repository = new InMemoryRepository<Basket>();
    const input: Basket = { lines: [{ sku: "A-1", quantity: 1 }] };

    const created = await repository.add(input);
    input.lines.push({ sku: "B-2", quantity: 2 });
    created.lines[0] = { sku: "Z-9", quantity: 0 };

    const fetched = await repository.get(created.id);
    fetched?.lines.push({ sku: "C-3", quantity: 3 });
    const [listed] = await repository.list();
    listed?.lines.pop();

    expect(await repository.get(created.id)).toEqual({
      id: created.id,
      lines: [{ sku: "A-1", quantity: 1 }],
    });
  });
});
