import {
    ConfigError,
    UnresolvedReference,
    UnresolvedVersionError
} from '../shared/utils/error-handling';
import { loadTemplate } from './templates';
import { VersionResolver } from './version-resolver';
import {
    ParameterValue,
    ResolvedCatalog,
    ResolvedStack,
    StackCatalog,
    StackSpec,
    TemplateInfo,
    VersionSource
} from './types';

/** Repo-wide versions are passed to templates in their short form */
export const SHORT_VERSION_LENGTH = 7;

export const ENVIRONMENT_GLOBAL = 'Environment';
export const TIMESTAMP_GLOBAL = '__timestamp__';

const SUBSTITUTION_PATTERN = /\$(?:\$|\{([_a-zA-Z][_a-zA-Z0-9]*)\}|([_a-zA-Z][_a-zA-Z0-9]*))/g;

/**
 * Names referenced by a `$sub` pattern (`${Name}` or `$Name`; `$$` is a literal `$`)
 */
export function substitutionIdentifiers(pattern: string): string[] {
    const identifiers: string[] = [];
    for (const match of pattern.matchAll(SUBSTITUTION_PATTERN)) {
        const name = match[1] ?? match[2];
        if (name !== undefined && !identifiers.includes(name)) {
            identifiers.push(name);
        }
    }
    return identifiers;
}

export function substitute(pattern: string, values: Readonly<Record<string, string>>): string {
    return pattern.replace(SUBSTITUTION_PATTERN, (match: string, braced: string | undefined, bare: string | undefined) => {
        const name = braced ?? bare;
        if (name === undefined) {
            return '$';
        }
        return values[name] ?? match;
    });
}

export interface CatalogResolverOptions {
    /** Epoch seconds exposed as the `__timestamp__` global */
    timestamp?: number;
}

type Resolution = { ok: true; value: string } | { ok: false };

/**
 * Resolves globals and stack parameters of a catalog into ResolvedStacks.
 * All problems across the catalog are reported together.
 */
export class CatalogResolver {
    private readonly catalog: StackCatalog;
    private readonly sources: readonly VersionSource[];
    private readonly builtIns: ReadonlyMap<string, string>;
    private readonly resolvedGlobals = new Map<string, Resolution>();
    private readonly referencedGlobals = new Set<string>();
    private readonly issues: string[] = [];
    private readonly unresolved: UnresolvedReference[] = [];

    constructor(catalog: StackCatalog, sources: readonly VersionSource[], options: CatalogResolverOptions = {}) {
        this.catalog = catalog;
        this.sources = sources;
        this.builtIns = new Map([
            [ENVIRONMENT_GLOBAL, catalog.environment],
            [TIMESTAMP_GLOBAL, String(options.timestamp ?? Math.floor(Date.now() / 1000))]
        ]);
    }

    /**
     * Resolve every enabled stack of the catalog
     * @throws ConfigError for catalog or template problems, else UnresolvedVersionError
     */
    public resolve(): ResolvedCatalog {
        const globals: Record<string, string> = Object.fromEntries(this.builtIns);
        for (const name of this.catalog.globals.keys()) {
            if (this.builtIns.has(name)) {
                continue;
            }
            const resolution = this.resolveGlobal(name, []);
            if (resolution.ok) {
                globals[name] = resolution.value;
            }
        }

        const byName = new Map(this.catalog.stacks.map(stack => [stack.baseName, stack]));
        const stacks = new Map<string, ResolvedStack>();
        const templateSources: Record<string, string[]> = {};

        for (const spec of this.catalog.stacks) {
            if (spec.disabled) {
                continue;
            }

            for (const dep of spec.dependsOn) {
                if (byName.get(dep)?.disabled) {
                    this.issues.push(`stack ${spec.baseName} depends on disabled stack ${dep}`);
                }
            }

            const template = this.loadStackTemplate(spec);
            const parameters = this.resolveParameters(spec, byName);
            if (!template || !parameters) {
                continue;
            }

            if (!this.checkTemplateParameters(spec, template, parameters)) {
                continue;
            }

            const fromEnvironment = templateSources[template.sourceEnvironment] ?? [];
            fromEnvironment.push(template.fileName);
            templateSources[template.sourceEnvironment] = fromEnvironment;
            stacks.set(spec.baseName, Object.freeze({
                spec,
                template,
                parameters: Object.freeze(parameters)
            }));
        }

        if (this.issues.length > 0) {
            throw new ConfigError('CatalogResolver', this.catalog.path, this.issues);
        }
        if (this.unresolved.length > 0) {
            throw new UnresolvedVersionError(this.catalog.path, this.unresolved);
        }

        const unusedGlobals = [...this.catalog.globals.keys()]
            .filter(name => !this.builtIns.has(name) && !this.referencedGlobals.has(name));

        return Object.freeze({
            catalog: this.catalog,
            globals: Object.freeze(globals),
            stacks,
            unusedGlobals,
            templateSources
        });
    }

    private resolveGlobal(name: string, chain: string[]): Resolution {
        const builtIn = this.builtIns.get(name);
        if (builtIn !== undefined) {
            return { ok: true, value: builtIn };
        }

        const cached = this.resolvedGlobals.get(name);
        if (cached) {
            return cached;
        }

        if (chain.includes(name)) {
            const cycle = [...chain.slice(chain.indexOf(name)), name];
            this.issues.push(`globals reference each other in a cycle: ${cycle.join(' -> ')}`);
            return { ok: false };
        }

        const value = this.catalog.globals.get(name);
        if (!value) {
            return { ok: false };
        }

        const resolution = this.resolveValue(value, 'globals', name, [...chain, name]);
        this.resolvedGlobals.set(name, resolution);
        return resolution;
    }

    private resolveValue(value: ParameterValue, owner: string, parameter: string, chain: string[]): Resolution {
        switch (value.kind) {
            case 'literal':
                return { ok: true, value: value.value };

            case 'version': {
                const reference = VersionResolver.format(value.reference);
                const result = VersionResolver.tryResolve(value.reference, this.sources);
                if (!result.resolved) {
                    this.unresolved.push({ owner, parameter, reference, reason: result.reason });
                    return { ok: false };
                }
                const version = value.reference.kind === 'repo-wide'
                    ? result.version.slice(0, SHORT_VERSION_LENGTH)
                    : result.version;
                return { ok: true, value: version };
            }

            case 'global': {
                this.referencedGlobals.add(value.name);
                if (!this.isKnownGlobal(value.name)) {
                    this.issues.push(`${owner}.${parameter}: global reference ${value.name} not found in globals`);
                    return { ok: false };
                }
                return this.resolveGlobal(value.name, chain);
            }

            case 'substitution': {
                const identifiers = substitutionIdentifiers(value.pattern);
                if (identifiers.length === 0) {
                    this.issues.push(`${owner}.${parameter}: $sub pattern '${value.pattern}' has no identifiers`);
                    return { ok: false };
                }

                const values: Record<string, string> = {};
                let ok = true;
                for (const identifier of identifiers) {
                    this.referencedGlobals.add(identifier);
                    if (!this.isKnownGlobal(identifier)) {
                        this.issues.push(`${owner}.${parameter}: identifier ${identifier} not found in globals`);
                        ok = false;
                        continue;
                    }
                    const resolution = this.resolveGlobal(identifier, chain);
                    if (resolution.ok) {
                        values[identifier] = resolution.value;
                    } else {
                        ok = false;
                    }
                }
                return ok ? { ok: true, value: substitute(value.pattern, values) } : { ok: false };
            }

            case 'stack':
                this.issues.push(`${owner}.${parameter}: $stack is only allowed in stack parameters`);
                return { ok: false };
        }
    }

    private resolveParameters(
        spec: StackSpec,
        byName: ReadonlyMap<string, StackSpec>
    ): Record<string, string> | undefined {
        const parameters: Record<string, string> = {};
        let complete = true;

        for (const [name, value] of spec.parameters) {
            if (value.kind === 'stack') {
                const target = byName.get(value.baseName);
                if (!target) {
                    this.issues.push(`${spec.fullName}.${name}: $stack references unknown stack ${value.baseName}`);
                    complete = false;
                } else if (target.disabled) {
                    this.issues.push(`${spec.fullName}.${name}: $stack references disabled stack ${value.baseName}`);
                    complete = false;
                } else {
                    parameters[name] = target.fullName;
                }
                continue;
            }

            const resolution = this.resolveValue(value, spec.fullName, name, []);
            if (resolution.ok) {
                parameters[name] = resolution.value;
            } else {
                complete = false;
            }
        }

        return complete ? parameters : undefined;
    }

    /**
     * Fill undeclared-but-required template parameters from globals and report
     * missing and superfluous ones
     */
    private checkTemplateParameters(
        spec: StackSpec,
        template: TemplateInfo,
        parameters: Record<string, string>
    ): boolean {
        const missing: string[] = [];
        for (const name of template.declaredParameters) {
            if (name in parameters) {
                continue;
            }
            if (this.isKnownGlobal(name)) {
                this.referencedGlobals.add(name);
                const resolution = this.resolveGlobal(name, []);
                if (resolution.ok) {
                    parameters[name] = resolution.value;
                }
                continue;
            }
            if (!template.optionalParameters.includes(name)) {
                missing.push(name);
            }
        }

        const superfluous = Object.keys(parameters).filter(name => !template.declaredParameters.includes(name));

        if (missing.length > 0) {
            this.issues.push(`Missing parameters for ${spec.fullName} loaded from ${template.path}: ${missing.join(', ')}`);
        }
        if (superfluous.length > 0) {
            this.issues.push(
                `Superfluous parameters for ${spec.fullName} loaded from ${template.path}: ${superfluous.join(', ')}`
            );
        }

        return missing.length === 0 && superfluous.length === 0;
    }

    private loadStackTemplate(spec: StackSpec): TemplateInfo | undefined {
        try {
            return loadTemplate(
                this.catalog.directory,
                spec.templateFile,
                this.catalog.environment,
                this.catalog.environmentPriority
            );
        } catch (error) {
            if (!(error instanceof ConfigError)) {
                throw error;
            }
            this.issues.push(...error.issues.map(issue => `${spec.fullName}: ${issue}`));
            return undefined;
        }
    }

    private isKnownGlobal(name: string): boolean {
        return this.builtIns.has(name) || this.catalog.globals.has(name);
    }
}
