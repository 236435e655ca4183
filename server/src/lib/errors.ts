import type { ZodError } from "zod";

export type ErrorCode =
	| "CONFIG_ERROR"
	| "STORAGE_ERROR"
	| "VALIDATION_ERROR"
	| "NOT_FOUND"
	| "BAD_REQUEST"
	| "INTERNAL_ERROR";

export class AppError extends Error {
	public readonly code: ErrorCode;
	public readonly status: number;
	public readonly details?: unknown;

	constructor(params: { code: ErrorCode; message: string; status: number; details?: unknown; cause?: unknown }) {
		super(params.message, params.cause === undefined ? undefined : { cause: params.cause });
		this.name = "AppError";
		this.code = params.code;
		this.status = params.status;
		this.details = params.details;
	}
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
	return err instanceof AppError && (code === undefined || err.code === code);
}

export function asAppError(err: unknown): AppError {
	if (err instanceof AppError) {
		return err;
	}

	if (err instanceof Error) {
		return new AppError({
			code: "INTERNAL_ERROR",
			status: 500,
			message: err.message,
			cause: err
		});
	}

	return new AppError({
		code: "INTERNAL_ERROR",
		status: 500,
		message: "Unknown error",
		details: err
	});
}

export function configError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "CONFIG_ERROR",
		status: 500,
		message,
		details
	});
}

export function storageError(message: string, details?: unknown, cause?: unknown): AppError {
	return new AppError({
		code: "STORAGE_ERROR",
		status: 500,
		message,
		details,
		cause
	});
}

export function validationError(message: string, details?: unknown): AppError {
	return new AppError({
		code: "VALIDATION_ERROR",
		status: 400,
		message,
		details
	});
}

export function badRequest(message: string, details?: unknown): AppError {
	return new AppError({
		code: "BAD_REQUEST",
		status: 400,
		message,
		details
	});
}

export function notFound(message = "Not found"): AppError {
	return new AppError({
		code: "NOT_FOUND",
		status: 404,
		message
	});
}

/** Compact zod issues so they fit into a response body and a log line. */
export function fromZodError(prefix: string, error: ZodError): AppError {
	const issues = error.issues
		.slice(0, 5)
		.map(i => `${i.path.map(String).join(".") || "<root>"}: ${i.message}`);
	return validationError(`${prefix}: ${issues.join("; ")}`, issues);
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

export function toSafeErrorResponse(err: unknown): { status: number; body: { error: { code: ErrorCode; message: string } } } {
	const e = asAppError(err);

	// Internal details stay in the logs
	return {
		status: e.status,
		body: {
			error: {
				code: e.code,
				message: e.status >= 500 ? "Request failed" : e.message
			}
		}
	};
}
