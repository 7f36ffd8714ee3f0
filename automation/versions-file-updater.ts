import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError, toError } from '../shared/utils/error-handling';
import { DeploymentLogger } from '../shared/utils/logging';
import { bodyToString, S3Port } from './aws-clients';
import { isRecord } from './version-resolver';

const SHA_PATTERN = /^[0-9a-fA-F]+$/;

export interface VersionsFileUpdaterOptions {
    /** Needed for s3:// manifest URLs */
    s3?: S3Port;
    logger?: DeploymentLogger;
}

/**
 * Records new repo-wide and hash-based versions in a versions file
 */
export class VersionsFileUpdater {
    private readonly filePath: string;
    private readonly options: VersionsFileUpdaterOptions;
    private readonly data: Record<string, unknown>;

    constructor(filePath: string, options: VersionsFileUpdaterOptions = {}) {
        this.filePath = filePath;
        this.options = options;
        this.data = this.load();
    }

    /**
     * Record the commit SHA of a repository
     * @returns Whether the file changed
     */
    public updateRepoVersion(repo: string, sha: string): boolean {
        const repoName = repo.trim();
        const commit = sha.trim();
        if (!repoName) {
            throw new ConfigError('VersionsFileUpdater', this.filePath, 'Empty repository name');
        }
        if (!commit || !SHA_PATTERN.test(commit)) {
            throw new ConfigError('VersionsFileUpdater', this.filePath, `Invalid SHA: ${sha}`);
        }

        const versions = this.section('versions');
        if (versions[repoName] === commit) {
            this.options.logger?.info(`No update needed: ${repoName} is already at ${commit}`);
            return false;
        }

        versions[repoName] = commit;
        this.save();
        this.options.logger?.info(`Updated ${this.filePath} with ${repoName} -> ${commit}`);
        return true;
    }

    /**
     * Record per-artifact versions from a build manifest with a `versions:` section
     * @param manifestUrl `s3://bucket/key` or a local path
     * @returns Whether the file changed
     */
    public async updateArtifactVersions(repo: string, manifestUrl: string): Promise<boolean> {
        const repoName = repo.trim();
        const url = manifestUrl.trim();
        if (!repoName) {
            throw new ConfigError('VersionsFileUpdater', this.filePath, 'Empty repository name');
        }
        if (!url) {
            throw new ConfigError('VersionsFileUpdater', this.filePath, 'Empty manifest URL');
        }

        const versions = this.section('versions');
        const manifests = this.section('hash_based_lambdas');
        const manifestChanged = manifests[repoName] !== url;

        let artifactsChanged = false;
        const artifacts = await this.readManifestVersions(url);
        for (const [artifactKey, version] of Object.entries(artifacts)) {
            const key = `${repoName}#${artifactKey}`;
            if (versions[key] !== version) {
                this.options.logger?.info(`Updating ${key}: ${String(versions[key] ?? 'none')} -> ${version}`);
                versions[key] = version;
                artifactsChanged = true;
            }
        }

        if (manifestChanged) {
            manifests[repoName] = url;
        }

        if (!manifestChanged && !artifactsChanged) {
            this.options.logger?.info(`No update needed: ${repoName} manifest and artifact versions are current`);
            return false;
        }

        this.save();
        return true;
    }

    public static parseS3Url(url: string): { bucket: string; key: string } {
        const match = /^s3:\/\/([^/]+)\/(.+)$/.exec(url);
        if (!match) {
            throw new ConfigError('VersionsFileUpdater', url, `Invalid S3 URL format: ${url}`);
        }
        return { bucket: match[1], key: match[2] };
    }

    /**
     * Artifact versions from a manifest; an unreadable manifest yields none and only the URL is recorded
     */
    private async readManifestVersions(url: string): Promise<Record<string, string>> {
        let content: string;
        try {
            content = await this.readManifest(url);
        } catch (error) {
            this.options.logger?.warn(`Could not read manifest ${url}, only updating manifest URL: ${toError(error).message}`);
            return {};
        }

        let manifest: unknown;
        try {
            manifest = yaml.load(content, { schema: yaml.FAILSAFE_SCHEMA });
        } catch (error) {
            throw new ConfigError('VersionsFileUpdater', url, `Invalid manifest ${url}: ${toError(error).message}`);
        }

        const section = isRecord(manifest) ? manifest.versions : undefined;
        if (!isRecord(section)) {
            this.options.logger?.warn(`No 'versions' section found in manifest ${url}`);
            return {};
        }

        const versions: Record<string, string> = {};
        for (const [artifactKey, version] of Object.entries(section)) {
            if (typeof version === 'string') {
                versions[artifactKey] = version;
            }
        }
        return versions;
    }

    private async readManifest(url: string): Promise<string> {
        if (!url.startsWith('s3://')) {
            return fs.promises.readFile(url, 'utf8');
        }
        if (!this.options.s3) {
            throw new Error('no S3 client configured');
        }
        const { bucket, key } = VersionsFileUpdater.parseS3Url(url);
        const object = await this.options.s3.getObject({ Bucket: bucket, Key: key }).promise();
        return bodyToString(object.Body);
    }

    private section(name: string): Record<string, unknown> {
        const existing = this.data[name];
        if (isRecord(existing)) {
            return existing;
        }
        const created: Record<string, unknown> = {};
        this.data[name] = created;
        return created;
    }

    private load(): Record<string, unknown> {
        if (!fs.existsSync(this.filePath)) {
            return {};
        }
        let document: unknown;
        try {
            document = yaml.load(fs.readFileSync(this.filePath, 'utf8'), { schema: yaml.FAILSAFE_SCHEMA });
        } catch (error) {
            throw new ConfigError('VersionsFileUpdater', this.filePath, `Invalid versions file: ${toError(error).message}`);
        }
        return isRecord(document) ? document : {};
    }

    private save(): void {
        const dir = path.dirname(this.filePath);
        if (!fs.existsSync(dir)) {
            fs.mkdirSync(dir, { recursive: true });
        }
        fs.writeFileSync(this.filePath, yaml.dump(this.data, { indent: 2, lineWidth: 120, noRefs: true }), 'utf8');
    }
}
