/**
 * Concurrency Utility Tests
 *
 * Tests for the bounded runner, the mutexes and the timeout wrapper.
 */

import { describe, expect, it } from "vitest";
import { AsyncMutex, abortable, KeyedMutex, runWithConcurrency, withTimeout } from "../concurrency.js";
import { TimeoutError } from "../errors.js";
import { waitForAbort } from "./helpers.js";

function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("runWithConcurrency", () => {
	it("returns empty array for empty input", async () => {
		expect(await runWithConcurrency([], 3)).toEqual([]);
	});

	it("respects concurrency limit and keeps input order", async () => {
		let running = 0;
		let maxRunning = 0;

		const createTask = (value: number) => async () => {
			running++;
			maxRunning = Math.max(maxRunning, running);
			await delay(10 - value);
			running--;
			return value;
		};

		const results = await runWithConcurrency(
			Array.from({ length: 8 }, (_, i) => createTask(i)),
			3,
		);

		expect(results).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
		expect(maxRunning).toBe(3);
	});

	it("treats a limit below one as sequential", async () => {
		let running = 0;
		let maxRunning = 0;
		const task = async () => {
			running++;
			maxRunning = Math.max(maxRunning, running);
			await delay(1);
			running--;
			return running;
		};

		await runWithConcurrency([task, task, task], 0);
		expect(maxRunning).toBe(1);
	});

	it("rejects with the first task error", async () => {
		const tasks = [async () => 1, async () => Promise.reject(new Error("batch 2 failed")), async () => 3];
		await expect(runWithConcurrency(tasks, 2)).rejects.toThrow("batch 2 failed");
	});
});

describe("AsyncMutex", () => {
	it("runs critical sections one at a time in arrival order", async () => {
		const mutex = new AsyncMutex();
		const events: string[] = [];
		const section = (name: string, ms: number) =>
			mutex.runExclusive(async () => {
				events.push(`${name}:start`);
				await delay(ms);
				events.push(`${name}:end`);
				return name;
			});

		const results = await Promise.all([section("a", 15), section("b", 1), section("c", 5)]);

		expect(results).toEqual(["a", "b", "c"]);
		expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
		expect(mutex.locked).toBe(false);
	});

	it("releases the lock when a section throws", async () => {
		const mutex = new AsyncMutex();
		await expect(mutex.runExclusive(async () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
		expect(await mutex.runExclusive(async () => "next")).toBe("next");
	});
});

describe("KeyedMutex", () => {
	it("serializes the same key and drops it afterwards", async () => {
		const mutex = new KeyedMutex();
		const events: string[] = [];
		const section = (key: string, name: string, ms: number) =>
			mutex.runExclusive(key, async () => {
				events.push(`${name}:start`);
				await delay(ms);
				events.push(`${name}:end`);
			});

		const first = section("doc", "first", 10);
		const second = section("doc", "second", 1);
		expect(mutex.size).toBe(1);
		await Promise.all([first, second]);

		expect(events).toEqual(["first:start", "first:end", "second:start", "second:end"]);
		expect(mutex.size).toBe(0);
	});

	it("lets different keys run together", async () => {
		const mutex = new KeyedMutex();
		let running = 0;
		let maxRunning = 0;
		const section = (key: string) =>
			mutex.runExclusive(key, async () => {
				running++;
				maxRunning = Math.max(maxRunning, running);
				await delay(5);
				running--;
			});

		await Promise.all([section("a"), section("b")]);
		expect(maxRunning).toBe(2);
	});
});

describe("withTimeout", () => {
	it("returns the result within budget", async () => {
		expect(await withTimeout("fast", 100, async () => "done")).toBe("done");
	});

	it("rejects with TimeoutError and aborts the operation", async () => {
		const signals: AbortSignal[] = [];
		const promise = withTimeout("slow operation", 20, (signal) => {
			signals.push(signal);
			return waitForAbort(signal);
		});

		await expect(promise).rejects.toThrow(TimeoutError);
		await expect(promise).rejects.toThrow("slow operation timed out after 20ms");
		expect(signals[0].aborted).toBe(true);
	});

	it("rejects on timeout even when the operation ignores its signal", async () => {
		await expect(withTimeout("stubborn", 20, () => delay(200).then(() => "late"))).rejects.toThrow(
			"stubborn timed out after 20ms",
		);
	});

	it("forwards a parent abort to the operation", async () => {
		const parent = new AbortController();
		const promise = withTimeout("cancellable", 1000, (signal) => waitForAbort(signal), parent.signal);
		parent.abort(new Error("user cancelled"));

		await expect(promise).rejects.toThrow("user cancelled");
	});

	it("starts aborted when the parent already is", async () => {
		const parent = new AbortController();
		parent.abort(new Error("already gone"));

		const aborted = await withTimeout("pre-aborted", 1000, async (signal) => signal.aborted, parent.signal);
		expect(aborted).toBe(true);
	});
});

describe("abortable", () => {
	it("settles with the promise when not aborted", async () => {
		const controller = new AbortController();
		expect(await abortable(Promise.resolve(7), controller.signal)).toBe(7);
	});

	it("rejects with the abort reason as soon as the signal fires", async () => {
		const controller = new AbortController();
		const promise = abortable(delay(200).then(() => "late"), controller.signal);
		controller.abort(new Error("stop"));

		await expect(promise).rejects.toThrow("stop");
	});

	it("rejects immediately for an aborted signal", async () => {
		const controller = new AbortController();
		controller.abort(new Error("too late"));
		await expect(abortable(Promise.resolve(1), controller.signal)).rejects.toThrow("too late");
	});
});
