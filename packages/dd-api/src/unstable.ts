import createDebug from "debug";
import { DatadogError } from "./error.js";

const debug = createDebug("ddapi:unstable");

/** Beta operations that must be enabled explicitly before use. */
export const UNSTABLE_OPERATION_IDS = [
	"v2.CreateIncident",
	"v2.DeleteIncident",
	"v2.GetIncident",
	"v2.ListIncidents",
	"v2.UpdateIncident",
] as const;

export type UnstableOperationId = (typeof UNSTABLE_OPERATION_IDS)[number];

export function isUnstableOperationId(id: string): id is UnstableOperationId {
	return (UNSTABLE_OPERATION_IDS as readonly string[]).includes(id);
}

export class UnstableOperations {
	private readonly enabled = new Map<UnstableOperationId, boolean>();

	constructor(initial?: Partial<Record<UnstableOperationId, boolean>>) {
		for (const id of UNSTABLE_OPERATION_IDS) {
			this.enabled.set(id, false);
		}
		for (const [id, on] of Object.entries(initial ?? {})) {
			this.set(id, on === true);
		}
	}

	public isEnabled(id: UnstableOperationId): boolean {
		return this.enabled.get(id) ?? false;
	}

	public set(id: string, enabled: boolean): void {
		if (!isUnstableOperationId(id)) {
			throw new DatadogError({
				message: `Unknown unstable operation '${id}'`,
				code: "UNKNOWN_UNSTABLE_OPERATION",
				origin: "sdk",
			});
		}
		this.enabled.set(id, enabled);
	}

	/**
	 * Throws unless `id` is a stable operation or an enabled unstable one.
	 */
	public assertEnabled(id: string): void {
		if (!isUnstableOperationId(id)) return;
		if (!this.isEnabled(id)) {
			throw new DatadogError({
				message: `Unstable operation '${id}' is disabled`,
				code: "UNSTABLE_OPERATION_DISABLED",
				origin: "sdk",
			});
		}
		debug("WARNING: Using unstable operation '%s'", id);
	}
}
