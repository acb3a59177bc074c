import { MemoryCacheStore } from "../memoryStore";

describe("MemoryCacheStore", () => {
    let now: number;
    let store: MemoryCacheStore;

    beforeEach(() => {
        now = 1_000_000;
        store = new MemoryCacheStore({ maxSize: 3, now: () => now });
    });

    it("stores values until their TTL elapses", async () => {
        await store.set("k", "v", 10);

        expect(await store.get("k")).toBe("v");
        expect(await store.ttl("k")).toBe(10);

        now += 9_500;
        expect(await store.ttl("k")).toBe(1);
        expect(await store.exists("k")).toBe(true);

        now += 500;
        expect(await store.get("k")).toBeNull();
        expect(await store.exists("k")).toBe(false);
        expect(await store.ttl("k")).toBe(-2);
    });

    it("keeps entries without expiry when ttl is zero", async () => {
        await store.set("k", "v", 0);
        now += 10_000_000;

        expect(await store.get("k")).toBe("v");
        expect(await store.ttl("k")).toBe(-1);
    });

    it("evicts the least recently used entry beyond maxSize", async () => {
        await store.set("a", "1", 60);
        await store.set("b", "2", 60);
        await store.set("c", "3", 60);
        await store.get("a");
        await store.set("d", "4", 60);

        expect(await store.get("b")).toBeNull();
        expect(await store.get("a")).toBe("1");
        expect(await store.get("c")).toBe("3");
        expect(await store.get("d")).toBe("4");
        expect(await store.stats()).toEqual({ backend: "memory", keys: 3, maxSize: 3 });
    });

    it("deletes keys and counts only live ones", async () => {
        await store.set("a", "1", 60);
        await store.set("b", "2", 1);
        now += 2_000;

        expect(await store.delete("a", "b", "missing")).toBe(1);
        expect(await store.stats()).toMatchObject({ keys: 0 });
    });
});
