import type { ServiceErrorKind } from "./types";

export class ContentExtractionError extends Error {
	readonly _tag = "ContentExtractionError";
	constructor(
		readonly kind: ServiceErrorKind,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "ContentExtractionError";
	}
}

export class NamingError extends Error {
	readonly _tag = "NamingError";
	constructor(
		readonly kind: ServiceErrorKind,
		message: string,
		options?: ErrorOptions,
	) {
		super(message, options);
		this.name = "NamingError";
	}
}

export type ServiceError = ContentExtractionError | NamingError;

export class MetadataWriteError extends Error {
	readonly _tag = "MetadataWriteError";
	constructor(
		readonly filePath: string,
		reason: string,
		options?: ErrorOptions,
	) {
		super(`Failed to write metadata to ${filePath}: ${reason}`, options);
		this.name = "MetadataWriteError";
	}
}

export class InvalidImageError extends Error {
	readonly _tag = "InvalidImageError";
	constructor(
		readonly filePath: string,
		reason: string,
		options?: ErrorOptions,
	) {
		super(`${filePath} is not a readable PNG: ${reason}`, options);
		this.name = "InvalidImageError";
	}
}

export class RenameCollisionExhaustedError extends Error {
	readonly _tag = "RenameCollisionExhaustedError";
	constructor(
		readonly baseName: string,
		readonly attempts: number,
	) {
		super(`No free name for "${baseName}" after ${attempts} numbered attempts`);
		this.name = "RenameCollisionExhaustedError";
	}
}

export class InvalidDimensionError extends Error {
	readonly _tag = "InvalidDimensionError";
	constructor(
		readonly width: number,
		readonly height: number,
	) {
		super(`Image dimensions must be positive, got ${width}x${height}`);
		this.name = "InvalidDimensionError";
	}
}

export class AuditLogError extends Error {
	readonly _tag = "AuditLogError";
	constructor(
		readonly logPath: string,
		reason: string,
		options?: ErrorOptions,
	) {
		super(`Audit log ${logPath}: ${reason}`, options);
		this.name = "AuditLogError";
	}
}

/** Raised before any file is touched: bad config, missing credentials, unusable folder */
export class ConfigError extends Error {
	readonly _tag = "ConfigError";
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = "ConfigError";
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
