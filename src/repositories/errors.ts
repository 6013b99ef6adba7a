export type DuplicateField = "username" | "email" | "code";

/** A write hit a unique column that another row already holds */
export class DuplicateEntryError extends Error {
	readonly field: DuplicateField;
	readonly value: string;

	constructor(field: DuplicateField, value: string) {
		super(`Duplicate ${field}: ${value}`);
		this.name = "DuplicateEntryError";
		this.field = field;
		this.value = value;
	}
}
