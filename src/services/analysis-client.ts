import { z } from "zod";
import { outcomeLabel } from "../core/failure-classifier";
import type { WorkflowContext } from "../types";

export interface AnalysisClient {
	analyze(context: WorkflowContext): Promise<string>;
}

export interface OllamaAnalysisOptions {
	url: string;
	model: string;
	timeoutMs: number;
}

const ChatResponseSchema = z.object({
	message: z.object({
		content: z.string(),
	}),
});

const SYSTEM_PROMPT = [
	"You are a Linux system administrator reviewing service failures reported by a health monitor.",
	"Each service below changed into a failing state since the last check.",
	"Use the attached log excerpts to identify likely root causes and suggest remediation steps.",
	"Be concise and actionable.",
].join("\n");

/** Renders the bundle as plain text: one status line per service, then log blocks. */
export function renderContext(context: WorkflowContext): string {
	const sections: string[] = [];

	sections.push(
		context.assessments
			.map(
				(a) =>
					`Service: ${a.serviceName} | Status: ${a.status} | Transition: ${outcomeLabel(a.outcome.kind)} | Critical: ${a.isCritical}`,
			)
			.join("\n"),
	);

	for (const serviceName of context.critical) {
		const logs = context.logs[serviceName];
		if (!logs) continue;
		const header = `=== Logs for ${serviceName} (${logs.strategy ?? "none"}${logs.source ? `: ${logs.source}` : ""}) ===`;
		const body =
			logs.lines.length > 0
				? logs.lines.join("\n")
				: `No logs available: ${logs.reason ?? "unknown reason"}`;
		sections.push(`${header}\n${body}`);
	}

	return sections.join("\n\n");
}

/** Sends the bundle to an Ollama-compatible `/api/chat` endpoint. */
export class OllamaAnalysisClient implements AnalysisClient {
	constructor(
		private readonly options: OllamaAnalysisOptions,
		private readonly fetchImpl: typeof fetch = fetch,
	) {}

	async analyze(context: WorkflowContext): Promise<string> {
		const endpoint = new URL("/api/chat", this.options.url);
		const response = await this.fetchImpl(endpoint, {
			method: "POST",
			headers: { "Content-Type": "application/json" },
			body: JSON.stringify({
				model: this.options.model,
				stream: false,
				options: { temperature: 0.2 },
				messages: [
					{ role: "system", content: SYSTEM_PROMPT },
					{ role: "user", content: renderContext(context) },
				],
			}),
			signal: AbortSignal.timeout(this.options.timeoutMs),
		});

		if (!response.ok) {
			throw new Error(`Analysis endpoint answered HTTP ${response.status}`);
		}

		const parsed = ChatResponseSchema.safeParse(await response.json());
		if (!parsed.success) {
			throw new Error("Analysis endpoint returned an unexpected payload");
		}
		return parsed.data.message.content.trim();
	}
}
