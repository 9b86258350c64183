import { XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { MonitorSourceError } from "../errors";
import type { HealthEntry, SnapshotPayload } from "../types";

export interface MonitorClientOptions {
	url: string;
	username: string;
	password: string;
	timeoutMs: number;
}

export interface RejectedEntry {
	index: number;
	serviceName: string | null;
	reason: string;
}

export interface MonitorListing {
	entries: HealthEntry[];
	rejected: RejectedEntry[];
}

export interface MonitorSource {
	fetchStatus(): Promise<MonitorListing>;
}

const ServiceEntrySchema = z
	.object({
		name: z.string().trim().min(1),
		status: z
			.string()
			.trim()
			.regex(/^-?\d+$/, "status must be an integer")
			.transform(Number),
	})
	.passthrough();

const DocumentSchema = z.object({
	// an empty <monit/> element parses to ""
	monit: z.preprocess(
		(value) => (value === "" ? {} : value),
		z.object({ service: z.array(z.unknown()).optional() }).passthrough(),
	),
});

const EntryObjectSchema = z.record(z.unknown());

const parser = new XMLParser({
	ignoreAttributes: false,
	attributeNamePrefix: "@_",
	parseTagValue: false,
	parseAttributeValue: false,
	trimValues: true,
	isArray: (_name, jpath) => jpath === "monit.service",
});

/**
 * Parses a Monit `_status?format=xml` document. Entries without a name or an
 * integer status are returned in `rejected` instead of failing the document.
 */
export function parseMonitStatus(xml: string): MonitorListing {
	const valid = XMLValidator.validate(xml);
	if (valid !== true) {
		throw new MonitorSourceError(
			`Unparsable status document: ${valid.err.msg} (line ${valid.err.line})`,
		);
	}

	const document = DocumentSchema.safeParse(parser.parse(xml));
	if (!document.success) {
		throw new MonitorSourceError(
			"Status document has no <monit> root",
			document.error,
		);
	}

	const entries: HealthEntry[] = [];
	const rejected: RejectedEntry[] = [];
	const services = document.data.monit.service ?? [];

	services.forEach((element, index) => {
		const object = EntryObjectSchema.safeParse(element);
		if (!object.success) {
			rejected.push({
				index,
				serviceName: null,
				reason: "service element has no fields",
			});
			return;
		}
		const raw = object.data;
		const parsed = ServiceEntrySchema.safeParse(raw);
		if (!parsed.success) {
			const name = typeof raw.name === "string" ? raw.name : null;
			rejected.push({
				index,
				serviceName: name,
				reason: parsed.error.issues.map((issue) => issue.message).join("; "),
			});
			return;
		}
		const payload: SnapshotPayload = raw;
		entries.push({
			serviceName: parsed.data.name,
			status: parsed.data.status,
			payload,
		});
	});

	return { entries, rejected };
}

export class MonitorClient implements MonitorSource {
	constructor(
		private readonly options: MonitorClientOptions,
		private readonly fetchImpl: typeof fetch = fetch,
	) {}

	private authorizationHeader(): Record<string, string> {
		if (!this.options.username) {
			return {};
		}
		const token = Buffer.from(
			`${this.options.username}:${this.options.password}`,
		).toString("base64");
		return { Authorization: `Basic ${token}` };
	}

	async fetchStatus(): Promise<MonitorListing> {
		let response: Response;
		try {
			response = await this.fetchImpl(this.options.url, {
				headers: {
					Accept: "application/xml, text/xml",
					...this.authorizationHeader(),
				},
				signal: AbortSignal.timeout(this.options.timeoutMs),
			});
		} catch (error) {
			throw new MonitorSourceError(
				`Monitor source unreachable: ${String(error)}`,
				error,
			);
		}

		if (!response.ok) {
			throw new MonitorSourceError(
				`Monitor source answered HTTP ${response.status}`,
			);
		}

		let body: string;
		try {
			body = await response.text();
		} catch (error) {
			throw new MonitorSourceError("Monitor response body unreadable", error);
		}
		return parseMonitStatus(body);
	}
}
