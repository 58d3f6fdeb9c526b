/**
 * Output module tests
 */

import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";
import {
	answer,
	configureOutput,
	debug,
	getOutputMode,
	header,
	IngestProgress,
	info,
	isHumanMode,
	keyValue,
	list,
	token,
	warning,
} from "../output.js";

describe("output", () => {
	let consoleSpy: ReturnType<typeof vi.spyOn>;
	let writeSpy: MockInstance<typeof process.stdout.write>;

	beforeEach(() => {
		consoleSpy = vi.spyOn(console, "log").mockImplementation(() => {});
		writeSpy = vi.spyOn(process.stdout, "write").mockImplementation(() => true);
		configureOutput({ mode: "agent", verbose: false });
	});

	afterEach(() => {
		consoleSpy.mockRestore();
		writeSpy.mockRestore();
		configureOutput({ mode: "agent", verbose: false });
	});

	function loggedEvents(): unknown[] {
		return consoleSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
	}

	describe("configureOutput", () => {
		it("switches between modes", () => {
			configureOutput({ mode: "human" });
			expect(getOutputMode()).toBe("human");
			expect(isHumanMode()).toBe(true);

			configureOutput({ mode: "agent" });
			expect(isHumanMode()).toBe(false);
		});
	});

	describe("agent mode", () => {
		it("emits one JSON event per call", () => {
			info("Indexed report.pdf", { chunks: 4 });
			warning("Weather tool unavailable");

			expect(loggedEvents()).toEqual([
				{ type: "info", message: "Indexed report.pdf", timestamp: expect.any(String), data: { chunks: 4 } },
				{ type: "warning", message: "Weather tool unavailable", timestamp: expect.any(String) },
			]);
		});

		it("drops debug events unless verbose", () => {
			debug("hidden");
			configureOutput({ verbose: true });
			debug("shown");

			expect(loggedEvents()).toEqual([{ type: "debug", message: "shown", timestamp: expect.any(String) }]);
		});

		it("emits answers with reasoning and tokens as events", () => {
			token("Hel");
			answer("Hello", { reasoning: "greet", data: { modelId: "qwen3:8b" } });

			expect(loggedEvents()).toEqual([
				{ type: "token", message: "Hel", timestamp: expect.any(String) },
				{
					type: "answer",
					message: "Hello",
					timestamp: expect.any(String),
					data: { modelId: "qwen3:8b", sources: [], reasoning: "greet" },
				},
			]);
			expect(writeSpy).not.toHaveBeenCalled();
		});

		it("reports key-value pairs and lists as data", () => {
			keyValue("Documents", 2);
			list(["a.txt", "b.pdf"]);

			expect(loggedEvents()).toEqual([
				{ type: "info", message: "Documents: 2", timestamp: expect.any(String), data: { Documents: 2 } },
				{ type: "info", message: "list", timestamp: expect.any(String), data: { items: ["a.txt", "b.pdf"] } },
			]);
		});

		it("reports each ingested file and the closing tally", () => {
			const progress = new IngestProgress(3);
			progress.record("a.txt", "indexed", "4 chunks");
			progress.record("b.pdf", "unchanged");
			progress.record("c.docx", "failed", "Unsupported file type: c.docx", { code: "UNSUPPORTED_FORMAT" });

			expect(progress.finish()).toEqual({ indexed: 1, cached: 0, unchanged: 1, failed: 1 });

			const events = loggedEvents();
			expect(events).toHaveLength(4);
			expect(events[0]).toMatchObject({
				type: "progress",
				message: "[1/3] a.txt: 4 chunks",
				data: { sourceName: "a.txt", status: "indexed", current: 1, total: 3 },
			});
			expect(events[1]).toMatchObject({ type: "progress", message: "[2/3] b.pdf: unchanged" });
			expect(events[2]).toMatchObject({
				type: "warning",
				message: "[3/3] c.docx: Unsupported file type: c.docx",
				data: { code: "UNSUPPORTED_FORMAT", status: "failed" },
			});
			expect(events[3]).toMatchObject({
				type: "warning",
				message: "Ingested 2/3 document(s)",
				data: { indexed: 1, unchanged: 1, failed: 1 },
			});
		});
	});

	describe("human mode", () => {
		beforeEach(() => {
			configureOutput({ mode: "human" });
		});

		it("writes streamed tokens straight to stdout", () => {
			token("Hel");
			token("lo");
			answer("Hello", { streamed: true });

			expect(writeSpy.mock.calls.map((call) => call[0])).toEqual(["Hel", "lo", "\n"]);
			expect(consoleSpy).not.toHaveBeenCalled();
		});

		it("prints a non-streamed answer followed by its sources", () => {
			answer("Paris", { sources: [{ sourceName: "report.txt", score: 0.6 }] });

			const lines = consoleSpy.mock.calls.map((call) => String(call[0]));
			expect(lines).toHaveLength(2);
			expect(lines[0]).toContain("Paris");
			expect(lines[1]).toContain("sources: report.txt (0.60)");
		});

		it("prints headers with an optional subtitle", () => {
			header("Models", "2 configured");

			const lines = consoleSpy.mock.calls.map((call) => String(call[0] ?? ""));
			expect(lines).toHaveLength(4);
			expect(lines[1]).toContain("Models");
			expect(lines[2]).toContain("2 configured");
		});
	});
});
