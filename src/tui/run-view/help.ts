import type { ViewStatus } from "./state.js";

export type RunViewMode = "summary" | "details";

export type HelpTextInput = {
	viewMode: RunViewMode;
	quitPromptVisible: boolean;
	status: ViewStatus;
};

export function formatHelpText({ viewMode, quitPromptVisible, status }: HelpTextInput): string {
	if (quitPromptVisible) {
		return status === "running"
			? "Y: abort run · N/Enter/Esc: continue run"
			: "Y/Enter: exit · Esc: back";
	}
	if (viewMode === "summary") {
		return "Tab: switch view · D: details · Q: exit";
	}
	return "Up/Down: select job · Tab: switch view · S: summary · Q: exit";
}
