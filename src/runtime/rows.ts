import assert from "assert"
import {QueryArrayResult, TypeOverrides} from "pg"
import {DecodeError} from "../errors"


/**
 * Row cursor consumed by generated decoders.
 *
 * Values of a row must come in the order of the entity's column list:
 * identifier first, then fields as declared. Nothing checks column names,
 * a query selecting columns in another order decodes misaligned values.
 */
export interface Rows {
    /**
     * Advances to the next row, returns false when there are no more rows.
     */
    next(): boolean
    /**
     * Values of the current row, which must have exactly `count` columns.
     */
    scan(count: number): unknown[]
}


export class ArrayRows implements Rows {
    private pos = -1

    constructor(private rows: unknown[][]) {}

    next(): boolean {
        if (this.pos < this.rows.length) {
            this.pos += 1
        }
        return this.pos < this.rows.length
    }

    scan(count: number): unknown[] {
        assert(this.pos >= 0 && this.pos < this.rows.length, 'scan called without a current row')
        let row = this.rows[this.pos]
        if (row.length != count) {
            throw new DecodeError(`expected ${count} columns, but row ${this.pos} has ${row.length}`)
        }
        return row
    }
}


const JSON_OID = 114
const JSONB_OID = 3802


/**
 * Type parsers for queries feeding generated decoders. `json` and `jsonb`
 * columns stay raw text, as decoders unmarshal JSON themselves,
 * every other type keeps the parser of `pg`.
 *
 *     client.query({text, values, rowMode: 'array', types: pgTypes()})
 */
export function pgTypes(): TypeOverrides {
    let types = new TypeOverrides()
    types.setTypeParser(JSON_OID, 'text', (value: string) => value)
    types.setTypeParser(JSONB_OID, 'text', (value: string) => value)
    return types
}


/**
 * Cursor over the result of a query issued with `rowMode: 'array'`
 * and the type parsers of `pgTypes()`.
 */
export function pgRows(result: QueryArrayResult): Rows {
    return new ArrayRows(result.rows)
}
