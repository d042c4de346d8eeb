import {expect} from "expect"
import {SchemaError} from "../errors"
import {buildGraph, GraphOptions} from "../graph"
import {describeGraph, getEntity} from "../model.tools"
import {blogGraph, graphOf} from "./util/setup"


const OPTIONS: GraphOptions = {idType: 'int32', header: '', runtime: 'rt', storage: ['sql']}


describe('graph', function() {
    describe('entities', function() {
        it('derives names of a declared entity', function() {
            let user = getEntity(blogGraph(), 'User')
            expect(user.receiver).toBe('u')
            expect(user.table).toBe('user')
            expect(user.file).toBe('user')
        })

        it('keeps declaration order of entities and fields', function() {
            let graph = blogGraph()
            expect(graph.entities.map(e => e.name)).toEqual(['User', 'Pet'])
            expect(getEntity(graph, 'User').fields.map(f => f.name)).toEqual([
                'age', 'name', 'nickname', 'score', 'settings', 'tags', 'role', 'active', 'createdAt', 'deletedAt'
            ])
        })

        it('maps field names to snake case columns', function() {
            let user = getEntity(blogGraph(), 'User')
            expect(user.fields.find(f => f.name == 'createdAt')?.column).toBe('created_at')
        })

        it('uses the configured id type', function() {
            expect(getEntity(blogGraph('int64'), 'Pet').id.type).toEqual({kind: 'int64'})
            expect(getEntity(blogGraph('string'), 'Pet').id.type).toEqual({kind: 'string'})
        })

        it('rejects duplicate entity names', function() {
            let schema = {
                entities: [
                    {name: 'User', fields: [], edges: []},
                    {name: 'User', fields: [], edges: []}
                ]
            }
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                new SchemaError('Duplicate entity name: User')
            )
        })

        it('rejects reserved entity names', function() {
            expect(() => graphOf(`type Rows @entity { name: String! }`)).toThrow('Entity name Rows is reserved')
        })

        it('rejects reserved property names', function() {
            let schema = {
                entities: [{
                    name: 'User',
                    fields: [{name: 'edges', type: 'String', optional: false, nillable: false}],
                    edges: []
                }]
            }
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                'Entity User declares reserved property edges'
            )
            schema.entities[0].fields[0].name = 'constructor'
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                new SchemaError('Entity User declares reserved property constructor')
            )
        })

        it('rejects entities named like exports of another entity', function() {
            expect(() => graphOf(`
                enum Role { ADMIN }
                type User @entity { role: Role! }
                type UserRole @entity { name: String! }
            `)).toThrow(
                new SchemaError('Name UserRole of entity UserRole collides with enum of User.role')
            )
            expect(() => graphOf(`
                type Pet @entity { name: String! }
                type Pets @entity { name: String! }
            `)).toThrow(
                new SchemaError('Name Pets of entity Pets collides with collection of Pet')
            )
        })

        it('rejects entities named like runtime exports', function() {
            let schema = {
                entities: [{name: 'Bool', fields: [], edges: []}]
            }
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                new SchemaError('Name scanBool of decoder of Bool collides with runtime export scanBool')
            )
        })
    })

    describe('fields', function() {
        it('resolves scalar kinds', function() {
            let graph = graphOf(`
                type Sample @entity {
                    a: Int8!
                    b: Uint64!
                    c: Float!
                    d: Float32
                    e: Boolean!
                    f: Time!
                    g: Int!
                }
            `)
            expect(getEntity(graph, 'Sample').fields.map(f => f.type)).toEqual([
                {kind: 'int8'},
                {kind: 'uint64'},
                {kind: 'float64'},
                {kind: 'float32'},
                {kind: 'bool'},
                {kind: 'time'},
                {kind: 'int'}
            ])
        })

        it('separates optional from nillable', function() {
            let user = getEntity(blogGraph(), 'User')
            let name = user.fields.find(f => f.name == 'name')
            let nickname = user.fields.find(f => f.name == 'nickname')
            expect(name).toMatchObject({optional: false, nillable: false})
            expect(nickname).toMatchObject({optional: true, nillable: true})
            let graph = graphOf(`type Note @entity { text: String }`)
            expect(getEntity(graph, 'Note').fields[0]).toMatchObject({optional: true, nillable: false})
        })

        it('treats JSON fields as nillable', function() {
            let user = getEntity(blogGraph(), 'User')
            expect(user.fields.find(f => f.name == 'settings')).toMatchObject({
                nillable: true,
                type: {kind: 'json', tsType: 'Record<string, string>'}
            })
        })

        it('stores lists as JSON', function() {
            let graph = graphOf(`
                enum Color { RED GREEN }
                type Sample @entity {
                    tags: [String!]
                    counts: [Int32!]!
                    colors: [Color]
                    custom: [Int!] @jsonType(ts: "Array<1 | 2>")
                }
            `)
            expect(getEntity(graph, 'Sample').fields.map(f => f.type)).toEqual([
                {kind: 'json', tsType: 'string[]'},
                {kind: 'json', tsType: 'number[]'},
                {kind: 'json', tsType: 'string[]'},
                {kind: 'json', tsType: 'Array<1 | 2>'}
            ])
        })

        it('keeps enum values in declaration order', function() {
            let user = getEntity(blogGraph(), 'User')
            expect(user.fields.find(f => f.name == 'role')?.type).toEqual({
                kind: 'enum',
                name: 'Role',
                values: ['ADMIN', 'MEMBER']
            })
        })

        it('rejects a JSON type on a non-JSON field', function() {
            expect(() => graphOf(`type Note @entity { text: String @jsonType(ts: "string") }`)).toThrow(
                new SchemaError('Note.text is not a JSON field, but declares a JSON type')
            )
        })

        it('rejects unrecognized types', function() {
            let schema = {
                entities: [{
                    name: 'Note',
                    fields: [{name: 'text', type: 'Text', optional: false, nillable: false}],
                    edges: []
                }]
            }
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                new SchemaError('Note.text has unrecognized type Text')
            )
        })

        it('rejects enums with duplicate values', function() {
            let schema = {
                entities: [{
                    name: 'Note',
                    fields: [{
                        name: 'kind',
                        type: 'Kind',
                        optional: false,
                        nillable: false,
                        enum: {name: 'Kind', values: ['A', 'A']}
                    }],
                    edges: []
                }]
            }
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                'Enum Kind of Note.kind has duplicate values'
            )
        })
    })

    describe('edges', function() {
        it('resolves relations of an edge and its inverse', function() {
            let graph = blogGraph()
            expect(getEntity(graph, 'User').edges).toEqual([
                {name: 'pets', owner: 'User', target: 'Pet', unique: false, required: false, inverse: false, ref: undefined, relation: 'O2M'},
                {name: 'spouse', owner: 'User', target: 'User', unique: true, required: false, inverse: false, ref: undefined, relation: 'O2O'}
            ])
            expect(getEntity(graph, 'Pet').edges).toEqual([
                {name: 'owner', owner: 'Pet', target: 'User', unique: true, required: false, inverse: true, ref: 'pets', relation: 'M2O'}
            ])
            expect(graph.edges.map(e => `${e.owner}.${e.name}`)).toEqual(['User.pets', 'User.spouse', 'Pet.owner'])
        })

        it('resolves one-sided and many-to-many relations', function() {
            let graph = graphOf(`
                type Group @entity {
                    users: [User!]
                    admin: User!
                    friends: [Group!]
                }
                type User @entity {
                    groups: [Group!] @ref(edge: "users")
                }
            `)
            let relations = graph.edges.map(e => `${e.owner}.${e.name}:${e.relation}`)
            expect(relations).toEqual([
                'Group.users:M2M',
                'Group.admin:M2O',
                'Group.friends:M2M',
                'User.groups:M2M'
            ])
            expect(getEntity(graph, 'Group').edges[1].required).toBe(true)
        })

        it('resolves one-to-one relations with an inverse', function() {
            let graph = graphOf(`
                type Card @entity {
                    owner: Person @ref(edge: "card")
                }
                type Person @entity {
                    card: Card
                }
            `)
            expect(graph.edges.map(e => e.relation)).toEqual(['O2O', 'O2O'])
        })

        it('rejects references to undeclared entities', function() {
            let schema = {
                entities: [{
                    name: 'User',
                    fields: [],
                    edges: [{name: 'pets', target: 'Pet', unique: false, required: false}]
                }]
            }
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                new SchemaError('Edge User.pets references undeclared entity Pet')
            )
        })

        it('rejects an inverse of a missing edge', function() {
            expect(() => graphOf(`
                type User @entity { name: String! }
                type Pet @entity { owner: User @ref(edge: "pets") }
            `)).toThrow(
                new SchemaError('Edge Pet.owner references User.pets, which is not an edge of User to Pet')
            )
        })

        it('rejects edges named like the accessor of another edge', function() {
            let schema = {
                entities: [{
                    name: 'Pet',
                    fields: [],
                    edges: [
                        {name: 'owner', target: 'Pet', unique: true, required: false},
                        {name: 'ownerOrErr', target: 'Pet', unique: true, required: false}
                    ]
                }]
            }
            expect(() => buildGraph(schema, OPTIONS)).toThrow(
                new SchemaError('Entity Pet declares edge ownerOrErr, which collides with the accessor of edge owner')
            )
        })
    })

    it('describes the graph', function() {
        let graph = graphOf(`
            type Pet @entity {
                name: String!
                owner: Pet
            }
        `)
        expect(describeGraph(graph)).toBe([
            'Pet:',
            '  +-------+--------+--------+----------+----------+',
            '  | Field | Type   | Column | Optional | Nillable |',
            '  +-------+--------+--------+----------+----------+',
            '  | id    | int32  | id     | false    | false    |',
            '  | name  | string | name   | false    | false    |',
            '  +-------+--------+--------+----------+----------+',
            '  +-------+------+---------+-----+----------+--------+',
            '  | Edge  | Type | Inverse | Ref | Relation | Unique |',
            '  +-------+------+---------+-----+----------+--------+',
            '  | owner | Pet  | false   |     | O2O      | true   |',
            '  +-------+------+---------+-----+----------+--------+',
            '',
            ''
        ].join('\n'))
    })
})
