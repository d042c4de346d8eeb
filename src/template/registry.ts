import {TemplateError} from "../errors"
import type {Entity, Graph} from "../model"


export interface Scope {
    graph: Graph
    entity?: Entity
    /**
     * Type name of a collection of `entity`, set for collection templates.
     */
    plural?: string
}


export interface TemplateExecutor {
    execute(name: string, scope: Scope): string
}


export type Template = (scope: Scope, exec: TemplateExecutor) => string


/**
 * Named templates. Registering a name again replaces the earlier template,
 * which is how external sources override built-in ones.
 */
export class TemplateRegistry implements TemplateExecutor {
    private templates = new Map<string, Template>()
    private stack: string[] = []

    add(name: string, template: Template): void {
        this.templates.set(name, template)
    }

    addAll(templates: Iterable<[string, Template]>): void {
        for (let [name, template] of templates) {
            this.add(name, template)
        }
    }

    has(name: string): boolean {
        return this.templates.has(name)
    }

    names(): string[] {
        return Array.from(this.templates.keys())
    }

    execute(name: string, scope: Scope): string {
        let template = this.templates.get(name)
        if (template == null) {
            throw new TemplateError(`template ${JSON.stringify(name)} is not defined`)
        }
        if (this.stack.includes(name)) {
            throw new TemplateError(`template ${JSON.stringify(name)} includes itself: ${this.stack.concat(name).join(' -> ')}`)
        }
        this.stack.push(name)
        try {
            return template(scope, this)
        } finally {
            this.stack.pop()
        }
    }
}


export function entityOf(scope: Scope, template: string): Entity {
    if (scope.entity == null) {
        throw new TemplateError(`template ${JSON.stringify(template)} requires an entity`)
    }
    return scope.entity
}
