import * as fs from 'fs';
import * as yaml from 'js-yaml';
import { ConfigError, UnresolvedVersionError } from '../shared/utils/error-handling';
import { VersionReference, VersionSource } from './types';

export type ResolutionResult =
    | { resolved: true; version: string }
    | { resolved: false; reason: string };

const IGNORED_SECTIONS = new Set(['hash_based_lambdas']);

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Resolution of version references against version sources
 */
export class VersionResolver {
    /**
     * Parse the `$version` value of a catalog entry
     * @param raw `"org/repo"`, `"org/repo#artifact"` or `{ repo, artifact }`
     * @param where Location used in error messages
     */
    public static parseReference(raw: unknown, where: string): VersionReference {
        if (typeof raw === 'string') {
            const value = raw.trim();
            const hashIndex = value.indexOf('#');
            if (hashIndex === -1) {
                if (!value) {
                    throw new ConfigError('StackCatalog', where, `${where}: empty $version reference`);
                }
                return { kind: 'repo-wide', repo: value };
            }

            const repo = value.slice(0, hashIndex).trim();
            const artifactKey = value.slice(hashIndex + 1).trim();
            if (!repo || !artifactKey) {
                throw new ConfigError('StackCatalog', where, `${where}: malformed $version reference '${raw}'`);
            }
            return { kind: 'hash-based', repo, artifactKey };
        }

        if (isRecord(raw)) {
            const repo = typeof raw.repo === 'string' ? raw.repo.trim() : '';
            const artifact = raw.artifact;
            if (repo && artifact === undefined) {
                return { kind: 'repo-wide', repo };
            }
            if (repo && typeof artifact === 'string' && artifact.trim()) {
                return { kind: 'hash-based', repo, artifactKey: artifact.trim() };
            }
        }

        throw new ConfigError('StackCatalog', where, `${where}: malformed $version reference ${JSON.stringify(raw)}`);
    }

    public static format(ref: VersionReference): string {
        return ref.kind === 'repo-wide' ? ref.repo : `${ref.repo}#${ref.artifactKey}`;
    }

    /**
     * Look a reference up; sources are consulted in order and the first hit wins
     */
    public static tryResolve(ref: VersionReference, sources: readonly VersionSource[]): ResolutionResult {
        if (ref.kind === 'repo-wide') {
            for (const source of sources) {
                const version = source.repoWide.get(ref.repo);
                if (version !== undefined) {
                    return { resolved: true, version };
                }
            }
            return { resolved: false, reason: `repository '${ref.repo}' has no repo-wide version in any version source` };
        }

        let repoKnown = false;
        for (const source of sources) {
            const artifacts = source.hashBased.get(ref.repo);
            if (artifacts) {
                repoKnown = true;
                const version = artifacts.get(ref.artifactKey);
                if (version !== undefined) {
                    return { resolved: true, version };
                }
            }
            // files written before the repo# prefix store artifacts under their bare key
            const legacy = source.repoWide.get(ref.artifactKey);
            if (legacy !== undefined) {
                return { resolved: true, version: legacy };
            }
        }

        return repoKnown
            ? { resolved: false, reason: `artifact '${ref.artifactKey}' not found under repository '${ref.repo}'` }
            : { resolved: false, reason: `repository '${ref.repo}' has no hash-based versions in any version source` };
    }

    /**
     * Resolve a reference to the stored version string
     * @throws UnresolvedVersionError naming the level that failed
     */
    public static resolve(ref: VersionReference, sources: readonly VersionSource[], owner: string = 'reference'): string {
        const result = this.tryResolve(ref, sources);
        if (!result.resolved) {
            throw new UnresolvedVersionError(this.format(ref), [
                { owner, reference: this.format(ref), reason: result.reason }
            ]);
        }
        return result.version;
    }

    /**
     * Read version documents fresh from disk
     * @param paths YAML or JSON versions files
     */
    public static loadVersionSources(paths: readonly string[]): VersionSource[] {
        return paths.map(filePath => {
            let content: string;
            try {
                content = fs.readFileSync(filePath, 'utf8');
            } catch (error) {
                const reason = error instanceof Error ? error.message : String(error);
                throw new ConfigError('VersionSource', filePath, `Cannot read versions file ${filePath}: ${reason}`);
            }
            return this.parseVersionDocument(content, filePath);
        });
    }

    /**
     * Parse one versions document into a frozen source
     */
    public static parseVersionDocument(content: string, origin: string): VersionSource {
        let document: unknown;
        try {
            // every scalar stays a string: unquoted SHAs such as 1234e56 or 0123456 must not become numbers
            document = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA, filename: origin });
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new ConfigError('VersionSource', origin, `Invalid versions document ${origin}: ${reason}`);
        }

        const repoWide = new Map<string, string>();
        const hashBased = new Map<string, Map<string, string>>();
        const issues: string[] = [];

        const addArtifact = (repo: string, artifactKey: string, version: string): void => {
            let artifacts = hashBased.get(repo);
            if (!artifacts) {
                artifacts = new Map<string, string>();
                hashBased.set(repo, artifacts);
            }
            artifacts.set(artifactKey, version);
        };

        if (document !== undefined && document !== null) {
            if (!isRecord(document)) {
                throw new ConfigError('VersionSource', origin, `Versions document ${origin} must be a mapping`);
            }

            const versions = document.versions;
            if ('versions' in document && versions !== null && !isRecord(versions)) {
                throw new ConfigError('VersionSource', origin, `${origin}: 'versions' must be a mapping`);
            }
            const entries: Record<string, unknown> = isRecord(versions)
                ? versions
                : 'versions' in document ? {} : document;

            for (const [key, value] of Object.entries(entries)) {
                if (IGNORED_SECTIONS.has(key)) {
                    continue;
                }

                const version = asVersionString(value);
                if (version !== undefined) {
                    const hashIndex = key.indexOf('#');
                    if (hashIndex === -1) {
                        repoWide.set(key, version);
                    } else if (hashIndex > 0 && hashIndex < key.length - 1) {
                        addArtifact(key.slice(0, hashIndex), key.slice(hashIndex + 1), version);
                    } else {
                        issues.push(`malformed key '${key}'`);
                    }
                    continue;
                }

                if (!isRecord(value)) {
                    issues.push(`entry '${key}' must be a version string or a mapping`);
                    continue;
                }

                for (const field of Object.keys(value)) {
                    if (field !== 'version' && field !== 'artifacts') {
                        issues.push(`entry '${key}' has unknown field '${field}'`);
                    }
                }

                if (value.version !== undefined) {
                    const nested = asVersionString(value.version);
                    if (nested === undefined) {
                        issues.push(`entry '${key}' has a non-string version`);
                    } else {
                        repoWide.set(key, nested);
                    }
                }

                const artifacts = value.artifacts;
                if (artifacts !== undefined) {
                    if (!isRecord(artifacts)) {
                        issues.push(`entry '${key}' artifacts must be a mapping`);
                        continue;
                    }
                    for (const [artifactKey, artifactVersion] of Object.entries(artifacts)) {
                        const nested = asVersionString(artifactVersion);
                        if (nested === undefined) {
                            issues.push(`artifact '${key}#${artifactKey}' has a non-string version`);
                        } else {
                            addArtifact(key, artifactKey, nested);
                        }
                    }
                }
            }
        }

        if (issues.length > 0) {
            throw new ConfigError('VersionSource', origin, issues.map(issue => `${origin}: ${issue}`));
        }

        return Object.freeze({ origin, repoWide, hashBased });
    }
}

function asVersionString(value: unknown): string | undefined {
    return typeof value === 'string' ? value : undefined;
}
