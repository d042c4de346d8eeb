import assert from "assert"
import {
    buildASTSchema,
    DocumentNode,
    extendSchema,
    GraphQLEnumType,
    GraphQLField,
    GraphQLList,
    GraphQLNamedType,
    GraphQLNonNull,
    GraphQLObjectType,
    GraphQLOutputType,
    GraphQLScalarType,
    GraphQLSchema,
    Kind,
    parse,
    Source
} from "graphql"
import type {DirectiveNode} from "graphql/language/ast"
import type {EdgeDefinition, EntityDefinition, FieldDefinition, SchemaDefinition} from "../definition"
import {SchemaError} from "../errors"
import {scalars_list} from "../scalars"


const baseSchema = buildASTSchema(parse(`
    directive @entity on OBJECT
    directive @nillable on FIELD_DEFINITION
    directive @jsonType(ts: String!) on FIELD_DEFINITION
    directive @ref(edge: String!) on FIELD_DEFINITION
    ${scalars_list.map(name => 'scalar ' + name).join('\n')}
`))


export function parseSchema(source: string, name: string): DocumentNode {
    try {
        return parse(new Source(source, name))
    } catch(e: unknown) {
        throw new SchemaError(e instanceof Error ? e.message : String(e))
    }
}


export function buildSchema(doc: DocumentNode): GraphQLSchema {
    try {
        return extendSchema(baseSchema, doc)
    } catch(e: unknown) {
        throw new SchemaError(e instanceof Error ? e.message : String(e))
    }
}


/**
 * Entity definitions of the document, in declaration order.
 */
export function buildDefinition(doc: DocumentNode): SchemaDefinition {
    let schema = buildSchema(doc)
    let entities: EntityDefinition[] = []
    for (let def of doc.definitions) {
        if (def.kind != Kind.OBJECT_TYPE_DEFINITION) continue
        let type = schema.getType(def.name.value)
        if (type && isEntityType(type)) {
            assert(type instanceof GraphQLObjectType)
            entities.push(buildEntity(type))
        }
    }
    return {entities}
}


function isEntityType(type: GraphQLNamedType): boolean {
    return type instanceof GraphQLObjectType && !!type.astNode?.directives?.some(d => d.name.value == 'entity')
}


function buildEntity(type: GraphQLObjectType): EntityDefinition {
    let fields: FieldDefinition[] = []
    let edges: EdgeDefinition[] = []
    let gqlFields = type.getFields()

    for (let key in gqlFields) {
        let f: GraphQLField<unknown, unknown> = gqlFields[key]
        let fieldType = f.type
        let optional = true
        if (fieldType instanceof GraphQLNonNull) {
            optional = false
            fieldType = fieldType.ofType
        }

        if (key == 'id') {
            let correctIdType = !optional && fieldType instanceof GraphQLScalarType && fieldType.name === 'ID'
            if (!correctIdType) {
                throw new SchemaError(`${type.name}.id must be declared as ID!`)
            }
            continue
        }

        let list = false
        if (fieldType instanceof GraphQLList) {
            list = true
            fieldType = unwrapListItem(type.name, key, fieldType.ofType)
        }

        let directives = f.astNode?.directives ?? []
        let nillable = directives.some(d => d.name.value == 'nillable')
        let jsonType = directiveArg(directives, 'jsonType', 'ts')

        if (fieldType instanceof GraphQLScalarType) {
            fields.push({name: key, type: fieldType.name, optional, nillable, list, jsonType})
        } else if (fieldType instanceof GraphQLEnumType) {
            fields.push({
                name: key,
                type: fieldType.name,
                optional,
                nillable,
                list,
                jsonType,
                enum: {
                    name: fieldType.name,
                    values: fieldType.getValues().map(v => v.name)
                }
            })
        } else if (fieldType instanceof GraphQLObjectType && isEntityType(fieldType)) {
            edges.push({
                name: key,
                target: fieldType.name,
                unique: !list,
                required: !optional,
                ref: directiveArg(directives, 'ref', 'edge')
            })
        } else {
            throw unsupportedFieldError(type.name, key)
        }
    }

    return {name: type.name, fields, edges}
}


function unwrapListItem(typeName: string, field: string, item: GraphQLOutputType): GraphQLOutputType {
    if (item instanceof GraphQLNonNull) {
        item = item.ofType
    }
    if (item instanceof GraphQLList) {
        throw unsupportedFieldError(typeName, field)
    }
    return item
}


function directiveArg(directives: readonly DirectiveNode[], directive: string, arg: string): string | undefined {
    let node = directives.find(d => d.name.value == directive)
    let value = node?.arguments?.find(a => a.name.value == arg)?.value
    if (value == null) return undefined
    assert(value.kind == Kind.STRING)
    return value.value
}


function unsupportedFieldError(type: string, field: string): SchemaError {
    return new SchemaError(`${type} has a property ${field} of unsupported type`)
}
