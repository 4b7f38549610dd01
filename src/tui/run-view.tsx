import { Box, Text, useApp, useStdout } from "ink";
import { useEffect, useState } from "react";
import { formatDuration, truncate } from "./format.js";
import type { BoardJob, BoardRun, BoardState, RunBoard } from "./run-board.js";
import {
	colorForRunStatus,
	colorForStatus,
	renderStatusGlyph,
	SPINNER_FRAMES,
	STATUS_LABELS,
} from "./status.js";

export type RunViewProps = {
	board: RunBoard;
};

const SPINNER_INTERVAL_MS = 80;
const JOB_NAME_WIDTH = 36;

export function RunView({ board }: RunViewProps): JSX.Element {
	const { exit } = useApp();
	const { stdout } = useStdout();
	const [state, setState] = useState<BoardState>(board.state);
	const [spinnerIndex, setSpinnerIndex] = useState(0);

	useEffect(() => {
		setState(board.state);
		return board.subscribe(setState);
	}, [board]);

	useEffect(() => {
		if (state.closed) {
			return;
		}
		const timer = setInterval(() => {
			setSpinnerIndex((prev) => (prev + 1) % SPINNER_FRAMES.length);
		}, SPINNER_INTERVAL_MS);
		return () => clearInterval(timer);
	}, [state.closed]);

	useEffect(() => {
		if (state.closed) {
			exit();
		}
	}, [exit, state.closed]);

	const width = stdout.columns ?? 120;

	if (state.runs.length === 0) {
		return (
			<Box paddingX={1}>
				<Text dimColor>Waiting for pipelines…</Text>
			</Box>
		);
	}

	return (
		<Box flexDirection="column" paddingX={1}>
			{state.runs.map((run) => (
				<RunPanel key={run.runId} run={run} spinnerIndex={spinnerIndex} width={width} />
			))}
		</Box>
	);
}

type RunPanelProps = {
	run: BoardRun;
	spinnerIndex: number;
	width: number;
};

function RunPanel({ run, spinnerIndex, width }: RunPanelProps): JSX.Element {
	return (
		<Box flexDirection="column" borderStyle="round" paddingX={1} marginBottom={1}>
			<Box>
				<Text bold>{run.pipeline}</Text>
				<Text dimColor> {run.runId} </Text>
				<Text color={colorForRunStatus(run.status)}>{run.status}</Text>
			</Box>
			{run.jobs.map((job) => (
				<JobRow key={job.jobId} job={job} spinnerIndex={spinnerIndex} width={width} />
			))}
		</Box>
	);
}

type JobRowProps = {
	job: BoardJob;
	spinnerIndex: number;
	width: number;
};

function JobRow({ job, spinnerIndex, width }: JobRowProps): JSX.Element {
	const color = colorForStatus(job.status);
	const detail = job.status === "running" ? job.lastLine : job.reason;
	const detailWidth = Math.max(10, width - JOB_NAME_WIDTH - 30);

	return (
		<Box>
			<Box width={2}>
				<Text color={color}>{renderStatusGlyph(job.status, spinnerIndex)}</Text>
			</Box>
			<Box width={JOB_NAME_WIDTH}>
				<Text>{truncate(job.jobId, JOB_NAME_WIDTH - 1)}</Text>
			</Box>
			<Box width={12}>
				<Text color={color} dimColor={job.status === "pending"}>
					{STATUS_LABELS[job.status]}
				</Text>
			</Box>
			<Box width={10}>
				<Text dimColor>{job.durationMs === undefined ? "" : formatDuration(job.durationMs)}</Text>
			</Box>
			{job.cancelRequested && job.status === "running" ? (
				<Text color="yellow">cancelling </Text>
			) : null}
			{detail ? <Text dimColor>{truncate(detail, detailWidth)}</Text> : null}
		</Box>
	);
}
