import { describe, expect, it } from "vitest";
import { formatHelpText } from "../src/tui/run-view/help.js";

describe("formatHelpText", () => {
	it("lists the summary controls", () => {
		expect(formatHelpText({ viewMode: "summary", quitPromptVisible: false, status: "running" })).toBe(
			"Tab: switch view · D: details · Q: exit",
		);
	});

	it("lists the details controls", () => {
		expect(formatHelpText({ viewMode: "details", quitPromptVisible: false, status: "running" })).toBe(
			"Up/Down: select job · Tab: switch view · S: summary · Q: exit",
		);
	});

	it("asks to abort while the run is still going", () => {
		expect(formatHelpText({ viewMode: "details", quitPromptVisible: true, status: "running" })).toBe(
			"Y: abort run · N/Enter/Esc: continue run",
		);
	});

	it("asks to exit once the run is over", () => {
		expect(formatHelpText({ viewMode: "summary", quitPromptVisible: true, status: "failed" })).toBe(
			"Y/Enter: exit · Esc: back",
		);
	});
});
