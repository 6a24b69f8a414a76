import { Box, Text, useApp, useInput, useStdout } from "ink";
import { useCallback, useEffect, useMemo, useRef, useState } from "react";
import type { EngineEventListener, OutputListener } from "../../core/engine.js";
import type { RunGraph } from "../../core/graph.js";
import type { RunReport } from "../../core/types.js";
import { formatDuration, formatMatrix } from "./format.js";
import { formatHelpText, type RunViewMode } from "./help.js";
import {
	appendJobOutput,
	applyRunEvent,
	createRunViewState,
	orderedJobIds,
	type RunViewState,
	tailLines,
} from "./state.js";
import { colorForStatus, renderStatusGlyph, SPINNER_FRAMES, STATUS_LABELS } from "./status.js";

export type RunHandlers = {
	onEvent: EngineEventListener;
	onOutput: OutputListener;
};

export type RunViewProps = {
	graph: RunGraph;
	title: string;
	start: (handlers: RunHandlers) => Promise<RunReport>;
	onComplete: (report: RunReport) => void;
	onError: (error: unknown) => void;
	onAbort: () => void;
};

const OUTPUT_FLUSH_MS = 100;
const DETAILS_RESERVED_ROWS = 12;
const SUMMARY_TAIL_LINES = 3;

export function RunView({
	graph,
	title,
	start,
	onComplete,
	onError,
	onAbort,
}: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const { stdout } = useStdout();
	const [state, setState] = useState<RunViewState>(() => createRunViewState(graph));
	const [viewMode, setViewMode] = useState<RunViewMode>("summary");
	const [selectedJobIndex, setSelectedJobIndex] = useState(0);
	const [quitPromptVisible, setQuitPromptVisible] = useState(false);
	const [spinnerIndex, setSpinnerIndex] = useState(0);
	const [terminalHeight, setTerminalHeight] = useState<number>(stdout.rows ?? 40);
	const started = useRef(false);
	const pendingOutput = useRef<{ jobId: string; chunk: string }[]>([]);
	const flushTimer = useRef<NodeJS.Timeout | null>(null);

	const jobIds = useMemo(() => orderedJobIds(state), [state]);
	const selectedJob = state.jobs[jobIds[selectedJobIndex] ?? ""];
	const maxDetailsLines = Math.max(2, terminalHeight - DETAILS_RESERVED_ROWS);

	const flushOutput = useCallback(() => {
		flushTimer.current = null;
		const chunks = pendingOutput.current;
		pendingOutput.current = [];
		if (chunks.length === 0) {
			return;
		}
		setState((prev) =>
			chunks.reduce((next, { jobId, chunk }) => appendJobOutput(next, jobId, chunk), prev),
		);
	}, []);

	useEffect(() => {
		if (started.current) {
			return;
		}
		started.current = true;

		const handlers: RunHandlers = {
			onEvent: (event) => setState((prev) => applyRunEvent(prev, event)),
			onOutput: (chunk, _source, jobId) => {
				pendingOutput.current.push({ jobId, chunk });
				if (!flushTimer.current) {
					flushTimer.current = setTimeout(flushOutput, OUTPUT_FLUSH_MS);
				}
			},
		};

		void start(handlers)
			.then((report) => {
				flushOutput();
				onComplete(report);
			})
			.catch((error: unknown) => onError(error))
			.finally(() => exit());
	}, [exit, flushOutput, onComplete, onError, start]);

	useEffect(() => {
		const interval = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
		}, 140);
		return () => clearInterval(interval);
	}, []);

	useEffect(() => {
		const handleResize = (): void => {
			setTerminalHeight(stdout.rows ?? 40);
		};
		stdout.on("resize", handleResize);
		return () => {
			stdout.off("resize", handleResize);
		};
	}, [stdout]);

	useEffect(
		() => () => {
			if (flushTimer.current) {
				clearTimeout(flushTimer.current);
			}
		},
		[],
	);

	useInput((input, key) => {
		if (quitPromptVisible) {
			if (input === "y" || (key.return && state.status !== "running")) {
				setQuitPromptVisible(false);
				if (state.status === "running") {
					onAbort();
				} else {
					exit();
				}
				return;
			}
			if (input === "n" || key.return || key.escape) {
				setQuitPromptVisible(false);
			}
			return;
		}
		if (input === "q") {
			setQuitPromptVisible(true);
			return;
		}
		if (key.tab || input === "\t") {
			setViewMode((prev) => (prev === "summary" ? "details" : "summary"));
			return;
		}
		if (input === "s") {
			setViewMode("summary");
			return;
		}
		if (input === "d") {
			setViewMode("details");
			return;
		}
		if (viewMode === "details" && key.upArrow) {
			setSelectedJobIndex((prev) => Math.max(0, prev - 1));
			return;
		}
		if (viewMode === "details" && key.downArrow) {
			setSelectedJobIndex((prev) => Math.min(jobIds.length - 1, prev + 1));
		}
	});

	return (
		<Box flexDirection="column" padding={1}>
			<Box flexDirection="column" marginBottom={1}>
				<Text>
					{title}
					{state.runId ? ` · ${state.runId}` : ""}
				</Text>
				<Text color={colorForStatus(state.status)} dimColor={state.status === "pending"}>
					{renderStatusGlyph(state.status, spinnerIndex)} {STATUS_LABELS[state.status]}
				</Text>
			</Box>

			{viewMode === "summary" ? (
				<Box flexDirection="column">
					{state.stages.map((stage) => (
						<Box key={stage.stage} flexDirection="column" marginBottom={1}>
							<Text bold>
								{stage.name}
								{stage.skipReason ? <Text dimColor> (skipped: {stage.skipReason})</Text> : null}
							</Text>
							{stage.jobIds.map((jobId) => {
								const job = state.jobs[jobId];
								if (!job) {
									return null;
								}
								const matrix = formatMatrix(job.matrix);
								const running = job.status === "running";
								return (
									<Box key={jobId} flexDirection="column" paddingLeft={2}>
										<Text color={colorForStatus(job.status)}>
											{renderStatusGlyph(job.status, spinnerIndex)} {matrix || job.stage}
											{job.durationMs !== undefined ? (
												<Text dimColor> {formatDuration(job.durationMs)}</Text>
											) : null}
										</Text>
										{job.status === "failed" && job.reason ? (
											<Text color="red"> {job.reason}</Text>
										) : null}
										{running
											? tailLines(state.output[jobId] ?? "", SUMMARY_TAIL_LINES).map((line, index) => (
													<Text key={`${jobId}-${index}`} dimColor wrap="truncate-end">
														{"  "}
														{line}
													</Text>
												))
											: null}
									</Box>
								);
							})}
						</Box>
					))}
				</Box>
			) : (
				<Box flexDirection="row">
					<Box flexDirection="column" width={32} paddingRight={2}>
						<Text dimColor>Jobs</Text>
						{jobIds.map((jobId, index) => {
							const job = state.jobs[jobId];
							if (!job) {
								return null;
							}
							const selected = index === selectedJobIndex;
							return (
								<Text
									key={jobId}
									color={colorForStatus(job.status)}
									inverse={selected}
									wrap="truncate-end"
								>
									{renderStatusGlyph(job.status, spinnerIndex)} {jobId}
								</Text>
							);
						})}
					</Box>
					<Box flexDirection="column" flexGrow={1}>
						<Text dimColor>Output</Text>
						<Text>{selectedJob?.jobId ?? "No job selected"}</Text>
						{selectedJob?.reason ? <Text dimColor>{selectedJob.reason}</Text> : null}
						{tailLines(state.output[selectedJob?.jobId ?? ""] ?? "", maxDetailsLines).map(
							(line, index) => (
								<Text key={`line-${index}`} wrap="truncate-end">
									{line}
								</Text>
							),
						)}
					</Box>
				</Box>
			)}

			<Box marginTop={1}>
				<Text dimColor>
					{quitPromptVisible
						? state.status === "running"
							? "Abort the run? "
							: "Exit? "
						: ""}
					{formatHelpText({ viewMode, quitPromptVisible, status: state.status })}
				</Text>
			</Box>
		</Box>
	);
}
