import {expect} from "expect"
import {SchemaError} from "../errors"
import {buildDefinition, parseSchema} from "../gql/schema"
import {loadSchema} from "../tools"
import {fixture} from "./util/setup"


function definitionOf(sdl: string) {
    return buildDefinition(parseSchema(sdl, 'schema.graphql'))
}


describe('schema', function() {
    it('loads entity fields and edges', function() {
        let schema = loadSchema(fixture('blog.graphql'))
        expect(schema.entities.map(e => e.name)).toEqual(['User', 'Pet'])
        let pet = schema.entities[1]
        expect(pet.fields).toEqual([
            {name: 'name', type: 'String', optional: false, nillable: false, list: false, jsonType: undefined},
            {name: 'weight', type: 'Float64', optional: true, nillable: true, list: false, jsonType: undefined}
        ])
        expect(pet.edges).toEqual([
            {name: 'owner', target: 'User', unique: true, required: false, ref: 'pets'}
        ])
    })

    it('loads enum values and JSON types', function() {
        let user = loadSchema(fixture('blog.graphql')).entities[0]
        expect(user.fields.find(f => f.name == 'role')).toMatchObject({
            type: 'Role',
            enum: {name: 'Role', values: ['ADMIN', 'MEMBER']}
        })
        expect(user.fields.find(f => f.name == 'settings')).toMatchObject({
            type: 'JSON',
            optional: true,
            jsonType: 'Record<string, string>'
        })
        expect(user.fields.find(f => f.name == 'tags')).toMatchObject({type: 'String', list: true})
    })

    it('skips types without @entity', function() {
        let schema = definitionOf(`
            type Plain { a: String }
            type User @entity { name: String! }
        `)
        expect(schema.entities.map(e => e.name)).toEqual(['User'])
    })

    it('requires id to be ID!', function() {
        expect(() => definitionOf(`type User @entity { id: String! }`)).toThrow(
            new SchemaError('User.id must be declared as ID!')
        )
        expect(() => definitionOf(`type User @entity { id: ID }`)).toThrow(
            new SchemaError('User.id must be declared as ID!')
        )
    })

    it('rejects nested lists', function() {
        expect(() => definitionOf(`type User @entity { tags: [[String!]] }`)).toThrow(
            new SchemaError('User has a property tags of unsupported type')
        )
    })

    it('rejects non-entity object fields', function() {
        expect(() => definitionOf(`
            type Address { city: String }
            type User @entity { address: Address }
        `)).toThrow(
            new SchemaError('User has a property address of unsupported type')
        )
    })

    it('reports syntax errors and unknown types as schema errors', function() {
        expect(() => definitionOf(`type User @entity {`)).toThrow(SchemaError)
        expect(() => definitionOf(`type User @entity { a: Foo }`)).toThrow(SchemaError)
    })

    it('merges the schema files of a directory', function() {
        let schema = loadSchema(fixture('split'))
        expect(schema.entities.map(e => e.name)).toEqual(['User', 'Group'])
        expect(schema.entities[1].edges).toEqual([
            {name: 'users', target: 'User', unique: false, required: false, ref: 'groups'}
        ])
    })
})
