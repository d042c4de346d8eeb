import {pluralize, underscore} from "inflected"


export function snakeCase(name: string): string {
    return underscore(name)
}


export function upperCaseFirst(s: string): string {
    if (s) {
        return s[0].toUpperCase() + s.slice(1)
    } else {
        return s
    }
}


export function toColumn(fieldName: string): string {
    return snakeCase(fieldName)
}


export function toTable(entityName: string): string {
    return snakeCase(entityName)
}


export function toFile(entityName: string): string {
    return snakeCase(entityName)
}


export function toReceiver(entityName: string): string {
    return entityName[0].toLowerCase()
}


/**
 * Type name of a collection of entities: `User` -> `Users`, `Sheep` -> `SheepSlice`.
 */
export function toPlural(entityName: string): string {
    let plural = pluralize(entityName)
    return plural == entityName ? entityName + 'Slice' : plural
}


export function quote(s: string): string {
    return "'" + s.replace(/\\/g, '\\\\').replace(/'/g, "\\'") + "'"
}


export class Output {
    private out: string[] = []
    private indent = ''

    line(s?: string): void {
        if (s) {
            this.out.push(this.indent + s)
        } else {
            this.out.push('')
        }
    }

    lines(lines: string[]): void {
        lines.forEach(s => this.line(s))
    }

    block(start: string, cb: () => void): void {
        this.line(start + ' {')
        this.indent += '    '
        try {
            cb()
        } finally {
            this.indent = this.indent.slice(0, this.indent.length - 4)
        }
        this.line('}')
    }

    toString(): string {
        let out = ''
        for (let i = 0; i < this.out.length; i++) {
            out += this.out[i] + '\n'
        }
        return out
    }
}


/**
 * Renders rows as a plain text table with a header row.
 */
export function renderTable(header: string[], rows: string[][]): string[] {
    let widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => r[i].length)))
    let sep = '+' + widths.map(w => '-'.repeat(w + 2)).join('+') + '+'
    let row = (cells: string[]) => '| ' + cells.map((c, i) => c.padEnd(widths[i])).join(' | ') + ' |'
    return [sep, row(header), sep, ...rows.map(row), sep]
}
