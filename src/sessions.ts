import { z } from "zod";
import { ResourceApi } from "./api-client.js";
import type { CdpRequestOptions } from "./common.js";
import { OAuthClientCredentials } from "./credentials.js";
import { CdpError, invalidArgument } from "./error.js";
import { executeTasks } from "./lib/concurrency.js";
import { parseItems, type Schema } from "./lib/decode.js";
import { IdentifierSequence, identifierValue } from "./lib/identifier.js";

export type SessionType =
	| "CLIENT_CREDENTIALS"
	| "TOKEN_EXCHANGE"
	| "ONESHOT_TOKEN_EXCHANGE";

export type SessionStatus = "READY" | "ACTIVE" | "CANCELLED" | "EXPIRED" | "REVOKED" | "ACCESS_LOST";

export type ClientCredentials = {
	clientId: string;
	clientSecret: string;
};

export type Session = {
	id: number;
	type?: SessionType;
	status?: SessionStatus;
	creationTime?: number;
	expirationTime?: number;
	clientId?: string;
};

/** A new session. The `nonce` is handed to a service that acts on the caller's behalf. */
export type CreatedSession = {
	id: number;
	type?: SessionType;
	status: SessionStatus;
	nonce: string;
	clientId?: string;
};

const SessionTypeSchema = z.enum(["CLIENT_CREDENTIALS", "TOKEN_EXCHANGE", "ONESHOT_TOKEN_EXCHANGE"]);
const SessionStatusSchema = z.enum(["READY", "ACTIVE", "CANCELLED", "EXPIRED", "REVOKED", "ACCESS_LOST"]);

const SessionSchema: Schema<Session> = z
	.object({
		id: z.number(),
		type: SessionTypeSchema.optional(),
		status: SessionStatusSchema.optional(),
		creationTime: z.number().optional(),
		expirationTime: z.number().optional(),
		clientId: z.string().optional(),
	})
	.passthrough();

const CreatedSessionSchema: Schema<CreatedSession> = z
	.object({
		id: z.number(),
		type: SessionTypeSchema.optional(),
		status: SessionStatusSchema,
		nonce: z.string(),
		clientId: z.string().optional(),
	})
	.passthrough();

export class Sessions extends ResourceApi {
	protected readonly resourcePath = "/sessions";
	protected override readonly listLimit = 100;
	protected override readonly deleteLimit = 100;

	/**
	 * Create a session.
	 *
	 * @param clientCredentials Credentials the session runs as. Required for
	 *   `CLIENT_CREDENTIALS` unless this client itself uses client credentials.
	 * @param sessionType `DEFAULT` uses this client's own client credentials
	 *   when it has them, and token exchange otherwise.
	 */
	public async create(
		clientCredentials?: ClientCredentials,
		sessionType: SessionType | "DEFAULT" = "DEFAULT",
		options?: CdpRequestOptions,
	): Promise<CreatedSession> {
		const own = this.http.credentials;
		const credentials =
			clientCredentials ??
			(own instanceof OAuthClientCredentials
				? { clientId: own.clientId, clientSecret: own.clientSecret }
				: undefined);

		let item: Record<string, unknown>;
		switch (sessionType) {
			case "DEFAULT":
				item = credentials ? { ...credentials } : { tokenExchange: true };
				break;
			case "CLIENT_CREDENTIALS":
				if (!credentials) {
					throw invalidArgument(
						"For sessionType 'CLIENT_CREDENTIALS', either clientCredentials must be provided or this client must use OAuthClientCredentials",
					);
				}
				item = { ...credentials };
				break;
			case "TOKEN_EXCHANGE":
				item = { tokenExchange: true };
				break;
			case "ONESHOT_TOKEN_EXCHANGE":
				item = { oneshotTokenExchange: true };
				break;
			default:
				throw invalidArgument(`Session type not understood: ${String(sessionType)}`);
		}

		const data = await this.http.post(this.resourcePath, { items: [item] }, undefined, options);
		const [created] = parseItems(data, CreatedSessionSchema);
		if (!created) {
			throw new CdpError({ message: "Session creation returned no session", origin: "server" });
		}
		return created;
	}

	/**
	 * Revoke sessions. Revocation may take up to an hour to take effect.
	 *
	 * @returns Revoked sessions. Without permission to list sessions, only their ids are set.
	 */
	public async revoke(
		ids: number | readonly number[],
		options?: CdpRequestOptions,
	): Promise<Session[]> {
		const identifiers = IdentifierSequence.load({ ids });
		const summary = await executeTasks(
			async (chunk: IdentifierSequence) =>
				parseItems(
					await this.http.post(
						`${this.resourcePath}/revoke`,
						{ items: chunk.asDicts() },
						undefined,
						options,
					),
					SessionSchema,
				),
			identifiers.chunked(this.deleteLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk.identifiers,
			elementUnwrap: identifierValue,
		});
		return summary.joinedResults<Session>((sessions) => sessions);
	}

	/** Retrieve sessions by id. Fails when any id does not exist. */
	public async retrieve(
		ids: readonly number[],
		options?: CdpRequestOptions,
	): Promise<Session[]> {
		return await this.retrieveByIds(IdentifierSequence.load({ ids }), SessionSchema, {}, options);
	}

	/**
	 * List sessions of the project.
	 *
	 * @param args.status Only sessions with this status
	 * @param args.limit Max results (default 25; -1 for all)
	 */
	public async list(
		args: { status?: SessionStatus; limit?: number | null } = {},
		options?: CdpRequestOptions,
	): Promise<Session[]> {
		return await this.listItems(
			{
				method: "GET",
				filter: args.status ? { status: args.status } : undefined,
				limit: args.limit,
			},
			SessionSchema,
			options,
		);
	}
}
