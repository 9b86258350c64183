import { describe, expect, it, vi } from "vitest";
import type { JournalQuerySpec } from "../../types";
import {
	CommandError,
	type CommandRunner,
	JournalQuerySource,
	journalArgs,
	parseJournalOutput,
} from "./journal-query-source";

const spec: JournalQuerySpec = {
	strategy: "journal-query",
	unit: "vpnd.service",
	maxLines: 50,
};

function context() {
	return { signal: new AbortController().signal, maxBytes: 1024 * 1024 };
}

describe("JournalQuerySource", () => {
	it("builds journalctl arguments for system and user units", () => {
		expect(journalArgs(spec)).toEqual([
			"--no-pager",
			"--unit",
			"vpnd.service",
			"--lines",
			"50",
			"--output",
			"short-iso",
		]);
		expect(journalArgs({ ...spec, unit: "syncthing.service", userUnit: true })[0]).toBe(
			"--user",
		);
	});

	it("drops journal marker lines", () => {
		expect(
			parseJournalOutput(
				"-- Boot 1a2b --\n2024-05-01T10:00:00+0000 host vpnd[1]: up\n\n-- No entries --\n",
			),
		).toEqual(["2024-05-01T10:00:00+0000 host vpnd[1]: up"]);
	});

	it("returns the query output as lines", async () => {
		const runner = vi.fn<CommandRunner>().mockResolvedValue({
			stdout: "first\nsecond\n",
			stderr: "",
		});
		const source = new JournalQuerySource(1_000, runner);

		const output = await source.fetch(spec, context());
		expect(output).toEqual({
			source: "vpnd.service",
			lines: ["first", "second"],
			truncated: false,
		});
		expect(runner).toHaveBeenCalledWith("journalctl", journalArgs(spec), {
			timeout: 1_000,
			maxBuffer: 1024 * 1024,
			signal: expect.any(AbortSignal),
		});
	});

	it("treats an empty journal as an empty result with a reason", async () => {
		const runner = vi.fn<CommandRunner>().mockResolvedValue({
			stdout: "-- No entries --\n",
			stderr: "",
		});
		const source = new JournalQuerySource(1_000, runner);

		const output = await source.fetch(spec, context());
		expect(output.lines).toEqual([]);
		expect(output.reason).toBe("no journal entries for unit vpnd.service");
	});

	it("labels user units in the source", async () => {
		const runner = vi.fn<CommandRunner>().mockResolvedValue({ stdout: "ok\n", stderr: "" });
		const source = new JournalQuerySource(1_000, runner);

		const output = await source.fetch(
			{ strategy: "journal-query", unit: "syncthing.service", userUnit: true, maxLines: 5 },
			context(),
		);
		expect(output.source).toBe("user:syncthing.service");
	});

	it("maps runner failures to reasons", async () => {
		const missing = new JournalQuerySource(
			1_000,
			vi.fn<CommandRunner>().mockRejectedValue(
				new CommandError("spawn journalctl ENOENT", "ENOENT", false, ""),
			),
		);
		expect((await missing.fetch(spec, context())).reason).toBe(
			"journalctl is not available on this host",
		);

		const slow = new JournalQuerySource(
			250,
			vi.fn<CommandRunner>().mockRejectedValue(
				new CommandError("killed", null, true, ""),
			),
		);
		expect((await slow.fetch(spec, context())).reason).toBe(
			"journal query for vpnd.service timed out after 250ms",
		);

		const failed = new JournalQuerySource(
			1_000,
			vi.fn<CommandRunner>().mockRejectedValue(
				new CommandError("exit 1", 1, false, "Failed to add filter\nmore detail\n"),
			),
		);
		expect((await failed.fetch(spec, context())).reason).toBe(
			"journalctl exited with code 1 for vpnd.service: Failed to add filter",
		);
	});
});
