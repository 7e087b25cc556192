import { isJsonObject, type JsonObject, type JsonValue } from '@epss/protocol';

export const OUTPUT_FORMATS = ['json', 'csv'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

function sortKeys(value: JsonValue): JsonValue {
	if (Array.isArray(value)) {
		return value.map(sortKeys);
	}
	if (isJsonObject(value)) {
		const sorted: JsonObject = {};
		for (const key of Object.keys(value).sort()) {
			const child = value[key];
			if (child !== undefined) {
				sorted[key] = sortKeys(child);
			}
		}
		return sorted;
	}
	return value;
}

/**
 * Two-space indented JSON with object keys in sorted order
 */
export function formatJson(value: JsonValue): string {
	return `${JSON.stringify(sortKeys(value), null, 2)}\n`;
}

function csvCell(value: JsonValue | undefined): string {
	if (value === undefined || value === null) {
		return '';
	}
	const text = typeof value === 'object' ? JSON.stringify(value) : String(value);
	return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/**
 * CSV of the envelope's `data` rows. The header is the sorted union of the
 * row keys; an envelope without rows renders as nothing.
 */
export function formatCsv(value: JsonValue): string {
	const data = isJsonObject(value) ? value.data : undefined;
	const rows = Array.isArray(data) ? data.filter(isJsonObject) : [];
	if (rows.length === 0) {
		return '';
	}

	const columns = [...new Set(rows.flatMap((row) => Object.keys(row)))].sort();
	const lines = [columns.join(',')];
	for (const row of rows) {
		lines.push(columns.map((column) => csvCell(row[column])).join(','));
	}
	return `${lines.join('\r\n')}\r\n`;
}

export function formatOutput(value: JsonValue, format: OutputFormat): string {
	return format === 'csv' ? formatCsv(value) : formatJson(value);
}
