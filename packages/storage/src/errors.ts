/**
 * Storage Error Mapping
 */

import { DependencyUnavailableError, isDomainError, ValidationError } from "@shiftlog/domain";

/**
 * Domain errors pass through; driver failures become
 * DependencyUnavailableError("storage").
 */
export function toStorageError(operation: string, error: unknown): Error {
	if (isDomainError(error)) {
		return error;
	}
	const message = error instanceof Error ? error.message : "Unknown error";
	return new DependencyUnavailableError("storage", `${operation} failed: ${message}`, { cause: error });
}

export async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (error) {
		throw toStorageError(operation, error);
	}
}

export function assertClosable(record: { startTime: Date; endTime: Date | null }, endTime: Date): void {
	if (record.endTime !== null) {
		throw new ValidationError("Record is already closed", [
			{ path: "recordId", message: "Record is already closed" },
		]);
	}
	if (endTime.getTime() <= record.startTime.getTime()) {
		throw new ValidationError("End time must be after start time", [
			{ path: "endTime", message: "End time must be after start time" },
		]);
	}
}
