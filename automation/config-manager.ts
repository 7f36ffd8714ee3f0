import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { collectConfigIssues, ConfigError } from '../shared/utils/error-handling';
import { isRecord, VersionResolver } from './version-resolver';
import {
    CatalogDeploymentOptions,
    ExternalDependencyPolicy,
    ParameterValue,
    StackCatalog,
    StackSpec
} from './types';

export const DEFAULT_ENVIRONMENT_PRIORITY: readonly string[] = ['development', 'staging', 'production', 'devops'];

const STACK_FIELDS = new Set(['stack_name', 'template_file', 'parameters', 'dependencies', 'disabled']);
const REFERENCE_KEYS = ['$version', '$ref', '$sub', '$stack'];

export interface LoadCatalogOptions {
    /** Variables available to `${VAR}` substitution, process.env by default */
    env?: NodeJS.ProcessEnv;
    /** Literal globals that replace catalog globals of the same name */
    overrideGlobals?: Record<string, string>;
}

/**
 * Loading and validation of stack catalogs
 */
export class ConfigManager {
    /**
     * Load a stack catalog from a YAML or JSON file
     * @param catalogPath Path to the catalog document
     * @param options Substitution variables and global overrides
     * @returns Frozen catalog
     */
    public static loadCatalog(catalogPath: string, options: LoadCatalogOptions = {}): StackCatalog {
        const absolutePath = path.resolve(catalogPath);
        let content: string;
        try {
            content = fs.readFileSync(absolutePath, 'utf8');
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigError('StackCatalog', catalogPath, `Failed to read catalog ${catalogPath}: ${reason}`);
        }

        return this.parseCatalog(content, absolutePath, options);
    }

    /**
     * Parse catalog content; relative paths resolve against the catalog location
     */
    public static parseCatalog(content: string, catalogPath: string, options: LoadCatalogOptions = {}): StackCatalog {
        const substituted = this.substituteEnvironmentVariables(content, options.env ?? process.env, catalogPath);

        let document: unknown;
        try {
            document = yaml.load(substituted);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigError('StackCatalog', catalogPath, `Failed to parse catalog ${catalogPath}: ${reason}`);
        }

        if (!isRecord(document)) {
            throw new ConfigError('StackCatalog', catalogPath, `Catalog ${catalogPath} must be a mapping`);
        }

        const issues: string[] = [];
        const directory = path.dirname(catalogPath);

        const environment = typeof document.environment === 'string' ? document.environment.trim() : '';
        if (!environment) {
            issues.push('catalog must define an environment');
        }

        const globals = this.parseGlobals(document.globals, options.overrideGlobals ?? {}, issues);
        const stacks = this.parseStacks(document.stacks, environment, issues);
        const versionFiles = this.parseVersionFiles(document.repo_versions_file, directory, issues);
        const environmentPriority = this.parseEnvironmentPriority(document.environment_priority, issues);
        const deploymentOptions = this.parseDeploymentOptions(document.deployment_options, issues);

        if (issues.length > 0) {
            throw new ConfigError('StackCatalog', catalogPath, issues);
        }

        return Object.freeze({
            path: catalogPath,
            directory,
            environment,
            globals,
            stacks: Object.freeze(stacks),
            versionFiles: Object.freeze(versionFiles),
            environmentPriority: Object.freeze(environmentPriority),
            deploymentOptions: Object.freeze(deploymentOptions)
        });
    }

    /**
     * Read `KEY=VALUE` lines; `#` starts a comment line. A missing file yields no overrides.
     */
    public static loadOverrideGlobals(filePath: string): Record<string, string> {
        if (!fs.existsSync(filePath)) {
            return {};
        }

        const overrides: Record<string, string> = {};
        const lines = fs.readFileSync(filePath, 'utf8').split(/\r?\n/);
        lines.forEach((line, index) => {
            const trimmed = line.trim();
            if (!trimmed || trimmed.startsWith('#')) {
                return;
            }
            const separator = trimmed.indexOf('=');
            if (separator <= 0) {
                throw new ConfigError('StackCatalog', filePath, `${filePath}:${index + 1}: expected KEY=VALUE`);
            }
            overrides[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 1).trim();
        });
        return overrides;
    }

    /**
     * Parse one parameter or global value
     * @param raw Scalar, or a single-key mapping with `$version`, `$ref`, `$sub` or `$stack`
     * @param where Location used in error messages
     */
    public static parseParameterValue(raw: unknown, where: string): ParameterValue {
        if (typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
            return { kind: 'literal', value: String(raw) };
        }

        if (!isRecord(raw)) {
            throw new ConfigError('StackCatalog', where, `${where}: unsupported value ${JSON.stringify(raw)}`);
        }

        const keys = Object.keys(raw);
        const referenceKey = keys.length === 1 ? keys[0] : undefined;
        if (!referenceKey || !REFERENCE_KEYS.includes(referenceKey)) {
            throw new ConfigError(
                'StackCatalog',
                where,
                `${where}: expected exactly one of ${REFERENCE_KEYS.join(', ')}, got {${keys.join(', ')}}`
            );
        }

        const value = raw[referenceKey];
        if (referenceKey === '$version') {
            return { kind: 'version', reference: VersionResolver.parseReference(value, where) };
        }

        if (typeof value !== 'string' || !value.trim()) {
            throw new ConfigError('StackCatalog', where, `${where}: ${referenceKey} needs a non-empty string`);
        }

        switch (referenceKey) {
            case '$ref': return { kind: 'global', name: value.trim() };
            case '$sub': return { kind: 'substitution', pattern: value };
            default: return { kind: 'stack', baseName: value.trim() };
        }
    }

    /**
     * Default template file for a stack: snake_case name with a .yaml extension
     */
    public static templateFileFor(baseName: string): string {
        return `${baseName.replace(/-/g, '_').toLowerCase()}.yaml`;
    }

    public static fullNameFor(baseName: string, environment: string): string {
        return `${baseName}-${environment}`;
    }

    private static parseGlobals(
        raw: unknown,
        overrides: Record<string, string>,
        issues: string[]
    ): ReadonlyMap<string, ParameterValue> {
        const globals = new Map<string, ParameterValue>();

        if (raw !== undefined && raw !== null) {
            if (!isRecord(raw)) {
                issues.push('globals must be a mapping');
            } else {
                for (const [name, value] of Object.entries(raw)) {
                    collectConfigIssues(issues, () => globals.set(name, this.parseParameterValue(value, `globals.${name}`)));
                }
            }
        }

        for (const [name, value] of Object.entries(overrides)) {
            globals.set(name, { kind: 'literal', value });
        }

        return globals;
    }

    private static parseStacks(raw: unknown, environment: string, issues: string[]): StackSpec[] {
        const entries = this.normalizeStacksToArray(raw, issues);
        if (entries.length === 0) {
            issues.push('catalog must declare at least one stack');
            return [];
        }

        const stacks: StackSpec[] = [];
        const names = new Set<string>();

        entries.forEach((entry, index) => {
            if (!isRecord(entry)) {
                issues.push(`stacks[${index}] must be a mapping`);
                return;
            }

            const baseName = typeof entry.stack_name === 'string' ? entry.stack_name.trim() : '';
            if (!baseName) {
                issues.push(`stacks[${index}] must have a stack_name`);
                return;
            }
            if (names.has(baseName)) {
                issues.push(`duplicate stack name: ${baseName}`);
                return;
            }
            names.add(baseName);

            if (environment && baseName.endsWith(`-${environment}`)) {
                issues.push(`stack ${baseName} already carries the environment suffix -${environment}`);
            }

            for (const field of Object.keys(entry)) {
                if (!STACK_FIELDS.has(field)) {
                    issues.push(`stack ${baseName} has unknown field '${field}'`);
                }
            }

            const templateFile = entry.template_file === undefined
                ? this.templateFileFor(baseName)
                : typeof entry.template_file === 'string' && entry.template_file.trim()
                    ? entry.template_file.trim()
                    : undefined;
            if (templateFile === undefined) {
                issues.push(`stack ${baseName} has an invalid template_file`);
            }

            const parameters = new Map<string, ParameterValue>();
            const rawParameters = entry.parameters;
            if (rawParameters !== undefined && rawParameters !== null) {
                if (!isRecord(rawParameters)) {
                    issues.push(`stack ${baseName} parameters must be a mapping`);
                } else {
                    for (const [name, value] of Object.entries(rawParameters)) {
                        collectConfigIssues(issues, () =>
                            parameters.set(name, this.parseParameterValue(value, `${baseName}.${name}`))
                        );
                    }
                }
            }

            const dependsOn = this.parseDependencies(entry.dependencies, baseName, issues);

            const disabled = entry.disabled ?? false;
            if (typeof disabled !== 'boolean') {
                issues.push(`stack ${baseName} disabled must be true or false`);
            }

            stacks.push(Object.freeze({
                baseName,
                environment,
                fullName: this.fullNameFor(baseName, environment),
                templateFile: templateFile ?? '',
                parameters,
                dependsOn: Object.freeze(dependsOn),
                disabled: disabled === true
            }));
        });

        return stacks;
    }

    /**
     * Normalize stacks from map or array to array format, with names populated
     */
    private static normalizeStacksToArray(raw: unknown, issues: string[]): unknown[] {
        if (raw === undefined || raw === null) {
            return [];
        }
        if (Array.isArray(raw)) {
            return raw;
        }
        if (!isRecord(raw)) {
            issues.push('stacks must be a list or a mapping');
            return [];
        }

        return Object.entries(raw).map(([name, stack]) => {
            if (stack === null || stack === undefined) {
                return { stack_name: name };
            }
            return isRecord(stack) ? { ...stack, stack_name: stack.stack_name ?? name } : stack;
        });
    }

    private static parseDependencies(raw: unknown, baseName: string, issues: string[]): string[] {
        if (raw === undefined || raw === null) {
            return [];
        }
        if (!Array.isArray(raw) || raw.some(dep => typeof dep !== 'string' || !dep.trim())) {
            issues.push(`stack ${baseName} dependencies must be a list of stack names`);
            return [];
        }

        const dependencies: string[] = [];
        for (const dep of raw) {
            const name = String(dep).trim();
            if (name === baseName) {
                issues.push(`stack ${baseName} depends on itself`);
            } else if (!dependencies.includes(name)) {
                dependencies.push(name);
            }
        }
        return dependencies;
    }

    private static parseVersionFiles(raw: unknown, directory: string, issues: string[]): string[] {
        if (raw === undefined || raw === null) {
            return [];
        }
        const files = Array.isArray(raw) ? raw : [raw];
        if (files.some(file => typeof file !== 'string' || !file.trim())) {
            issues.push('repo_versions_file must be a path or a list of paths');
            return [];
        }
        return files.map(file => path.resolve(directory, String(file).trim()));
    }

    private static parseEnvironmentPriority(raw: unknown, issues: string[]): string[] {
        if (raw === undefined || raw === null) {
            return [...DEFAULT_ENVIRONMENT_PRIORITY];
        }
        if (!Array.isArray(raw) || raw.length === 0 || raw.some(env => typeof env !== 'string' || !env.trim())) {
            issues.push('environment_priority must be a non-empty list of environment names');
            return [...DEFAULT_ENVIRONMENT_PRIORITY];
        }
        return raw.map(env => String(env).trim());
    }

    private static parseDeploymentOptions(raw: unknown, issues: string[]): CatalogDeploymentOptions {
        const options: CatalogDeploymentOptions = {};
        if (raw === undefined || raw === null) {
            return options;
        }
        if (!isRecord(raw)) {
            issues.push('deployment_options must be a mapping');
            return options;
        }

        const maxParallel = raw.max_parallel;
        if (maxParallel !== undefined) {
            if (typeof maxParallel === 'number' && Number.isInteger(maxParallel) && maxParallel >= 1) {
                options.maxParallel = maxParallel;
            } else {
                issues.push('deployment_options.max_parallel must be a positive integer');
            }
        }

        const failFast = raw.fail_fast;
        if (failFast !== undefined) {
            if (typeof failFast === 'boolean') {
                options.failFast = failFast;
            } else {
                issues.push('deployment_options.fail_fast must be true or false');
            }
        }

        const external = raw.external_dependencies;
        if (external !== undefined) {
            if (isExternalDependencyPolicy(external)) {
                options.externalDependencies = external;
            } else {
                issues.push("deployment_options.external_dependencies must be 'error' or 'assume-deployed'");
            }
        }

        return options;
    }

    /**
     * Substitute environment variables in catalog content
     * Supports ${VAR_NAME} and $VAR_NAME syntax; `$$` stands for a literal `$`
     * @returns Content with environment variables substituted
     */
    private static substituteEnvironmentVariables(content: string, env: NodeJS.ProcessEnv, catalogPath: string): string {
        const missing = new Set<string>();

        const substituted = content.replace(
            /\$\$|\$\{([A-Z_][A-Z0-9_]*)\}|\$([A-Z_][A-Z0-9_]*)\b/g,
            (match: string, braced: string | undefined, bare: string | undefined) => {
                const varName = braced ?? bare;
                if (varName === undefined) {
                    return '$';
                }
                const value = env[varName];
                if (value === undefined) {
                    missing.add(varName);
                    return match;
                }
                return value;
            }
        );

        if (missing.size > 0) {
            throw new ConfigError(
                'StackCatalog',
                catalogPath,
                [...missing].map(varName => `Environment variable ${varName} is not defined`)
            );
        }

        return substituted;
    }
}

export function isExternalDependencyPolicy(value: unknown): value is ExternalDependencyPolicy {
    return value === 'error' || value === 'assume-deployed';
}
