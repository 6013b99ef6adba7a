import { DEFAULT_ARTICLE_UNIT } from "../../db/index.ts";
import { toOptionalTitleCase, toTitleCase } from "../../utils/textFormat.ts";

export const normaliseCode = (code: string): string => code.trim().toUpperCase();

export const normaliseName = (name: string): string => toTitleCase(name);

export const normaliseUnit = (unit: string | null | undefined): string =>
	unit && unit.trim() ? unit.trim().toLowerCase() : DEFAULT_ARTICLE_UNIT;

export const normaliseLabel = toOptionalTitleCase;

export const normaliseText = (value: string | null | undefined): string | null =>
	value && value.trim() ? value.trim() : null;

// Tools must have distinct names; machinery may share a name across codes
export const isTool = (type: string | null | undefined): boolean =>
	!!type && type.toLowerCase().includes("tool");
