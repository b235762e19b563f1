// table.ts
// Fixed-width text tables for the route report

export type Align = 'left' | 'right' | 'center'

export interface Column {
	header: string
	width: number
	align?: Align
}

export interface TableOptions {
	columns: Column[]
	/** 'none' drops the frame and separates cells with a space */
	borderStyle?: 'single' | 'none'
}

interface Frame {
	line: string
	cell: string
	top: [string, string, string] | null
	middle: [string, string, string]
	bottom: [string, string, string] | null
}

const FRAMES: Record<'single' | 'none', Frame> = {
	single: {
		line: '─',
		cell: '│',
		top: ['┌', '┬', '┐'],
		middle: ['├', '┼', '┤'],
		bottom: ['└', '┴', '┘'],
	},
	none: {
		line: ' ',
		cell: ' ',
		top: null,
		middle: ['', ' ', ''],
		bottom: null,
	},
}

function fitCell(text: string, width: number, align: Align): string {
	const fitted = text.length > width ? text.slice(0, width - 1) + '…' : text
	const gap = width - fitted.length

	if (align === 'right') return ' '.repeat(gap) + fitted
	if (align === 'center') {
		const left = Math.floor(gap / 2)
		return ' '.repeat(left) + fitted + ' '.repeat(gap - left)
	}
	return fitted + ' '.repeat(gap)
}

/**
 * Header, separator and one line per row; missing cells render blank
 */
export function renderTable(options: TableOptions, rows: string[][]): string {
	const { columns } = options
	const frame = FRAMES[options.borderStyle ?? 'single']

	const rule = ([left, join, right]: [string, string, string]): string =>
		left + columns.map((column) => frame.line.repeat(column.width)).join(join) + right
	const row = (cells: readonly string[]): string =>
		frame.cell +
		columns.map((column, i) => fitCell(cells[i] ?? '', column.width, column.align ?? 'left')).join(frame.cell) +
		frame.cell

	const lines: string[] = []
	if (frame.top) lines.push(rule(frame.top))
	lines.push(row(columns.map((column) => column.header)))
	lines.push(rule(frame.middle))
	for (const cells of rows) lines.push(row(cells))
	if (frame.bottom) lines.push(rule(frame.bottom))

	return lines.join('\n')
}

// ============================================================================
// FORMATTING HELPERS
// ============================================================================

/**
 * Format credits with K/M suffixes
 */
export function formatCredits(amount: number): string {
	const sign = amount < 0 ? '-' : ''
	const abs = Math.abs(amount)
	if (abs >= 1_000_000) return sign + (abs / 1_000_000).toFixed(1) + 'M'
	if (abs >= 10_000) return sign + (abs / 1_000).toFixed(1) + 'K'
	return sign + String(Math.round(abs))
}

/**
 * Light years with two decimals
 */
export function formatDistance(lightYears: number): string {
	return `${lightYears.toFixed(2)} ly`
}

/**
 * Format snapshot age in minutes/hours/days
 */
export function formatAge(minutes: number | null): string {
	if (minutes === null) return 'never'
	if (minutes < 60) return `${minutes}m`
	const hours = Math.floor(minutes / 60)
	if (hours < 48) {
		const mins = minutes % 60
		return mins === 0 ? `${hours}h` : `${hours}h${mins}m`
	}
	return `${Math.floor(hours / 24)}d`
}

/**
 * Milliseconds as m:ss, or "--:--" when unknown
 */
export function formatEta(ms: number | undefined): string {
	if (ms === undefined) return '--:--'
	const totalSeconds = Math.round(ms / 1000)
	const minutes = Math.floor(totalSeconds / 60)
	const seconds = totalSeconds % 60
	return `${minutes}:${String(seconds).padStart(2, '0')}`
}
