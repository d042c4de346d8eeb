export * from "./config"
export * from "./definition"
export * from "./errors"
export * from "./model"
export {buildGraph} from "./graph"
export {decodeStrategy, idStrategy} from "./decode"
export type {DecodeStrategy, IdStrategy} from "./decode"
export {describeGraph, getColumns, getEntity} from "./model.tools"
export {buildDefinition, parseSchema} from "./gql/schema"
export {generate, writeFiles} from "./gen"
export type {GeneratedFile} from "./gen"
export {TemplateRegistry} from "./template/registry"
export type {Scope, Template, TemplateExecutor} from "./template/registry"
export {compileTemplate, parseTemplates} from "./template/text"
export {createRegistry, loadTemplates} from "./template/load"
export {generateFromSchema, initSchemas, loadGraph, loadSchema} from "./tools"
