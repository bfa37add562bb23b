import { z } from 'zod';

const headersSchema = z.record(z.string(), z.string());

// ─── Server Message (Server -> Listener) ──────────────────────────────────────

export const ServerRegisteredSchema = z.object({
	type: z.literal('registered'),
	endpointId: z.string().min(1),
});
export type ServerRegistered = z.infer<typeof ServerRegisteredSchema>;

export const ServerRequestSchema = z.object({
	type: z.literal('request'),
	id: z.string().min(1),
	method: z.string().min(1),
	path: z.string().startsWith('/'),
	headers: headersSchema.default({}),
	// base64
	body: z.string().optional(),
});
export type ServerRequest = z.infer<typeof ServerRequestSchema>;

export const ServerHeartbeatSchema = z.object({
	type: z.literal('heartbeat'),
	timestamp: z.number().int().positive(),
});
export type ServerHeartbeat = z.infer<typeof ServerHeartbeatSchema>;

export const ServerErrorSchema = z.object({
	type: z.literal('error'),
	code: z.string(),
	message: z.string(),
	fatal: z.boolean().default(false),
});
export type ServerError = z.infer<typeof ServerErrorSchema>;

export const ServerMessageSchema = z.discriminatedUnion('type', [
	ServerRegisteredSchema,
	ServerRequestSchema,
	ServerHeartbeatSchema,
	ServerErrorSchema,
]);
export type ServerMessage = z.infer<typeof ServerMessageSchema>;

// ─── Listener Message (Listener -> Server) ────────────────────────────────────

export const ListenerRegisterSchema = z.object({
	type: z.literal('register'),
	endpointId: z.string().min(1),
});
export type ListenerRegister = z.infer<typeof ListenerRegisterSchema>;

export const ListenerResponseSchema = z.object({
	type: z.literal('response'),
	id: z.string().min(1),
	status: z.number().int().min(100).max(599),
	headers: headersSchema,
	body: z.string().optional(),
});
export type ListenerResponse = z.infer<typeof ListenerResponseSchema>;

export const ListenerHeartbeatAckSchema = z.object({
	type: z.literal('heartbeat_ack'),
	timestamp: z.number().int().positive(),
});
export type ListenerHeartbeatAck = z.infer<typeof ListenerHeartbeatAckSchema>;

export const ListenerMessageSchema = z.discriminatedUnion('type', [
	ListenerRegisterSchema,
	ListenerResponseSchema,
	ListenerHeartbeatAckSchema,
]);
export type ListenerMessage = z.infer<typeof ListenerMessageSchema>;
