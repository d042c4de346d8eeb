/**
 * Malformed or inconsistent schema input.
 */
export class SchemaError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'SchemaError'
    }
}


/**
 * A scanned value could not be converted to the declared type of its column.
 */
export class DecodeError extends Error {
    readonly column?: string

    constructor(message: string, column?: string, cause?: unknown) {
        super(column == null ? message : `column ${column}: ${message}`, {cause})
        this.name = 'DecodeError'
        this.column = column
    }
}


export class TemplateError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'TemplateError'
    }
}


export class ConfigError extends Error {
    constructor(message: string) {
        super(message)
        this.name = 'ConfigError'
    }
}


/**
 * Thrown by generated edge accessors when the edge was not loaded.
 */
export class NotLoadedError extends Error {
    readonly edge: string

    constructor(edge: string) {
        super(`edge ${edge} was not loaded`)
        this.name = 'NotLoadedError'
        this.edge = edge
    }
}
