import * as fs from 'fs/promises';
import * as mammoth from 'mammoth';
import { marked, Tokens } from 'marked';
import * as path from 'path';
import { FileSystemSourceConfig } from '../../models/config';
import { DocumentInfo, SourceListing } from '../../models/document';
import { DocumentReadError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { ConnectorSupport, ContentSource, PendingDocument, RetryOptions } from './base';

const SUPPORTED_EXTENSIONS = new Set(['.txt', '.md', '.docx']);

export function toDocumentId(rootPath: string, filePath: string): string {
    return path.relative(rootPath, filePath).split(path.sep).join('/');
}

/**
 * Title of a markdown document: its first heading, if any.
 */
export function markdownTitle(markdown: string): string | undefined {
    const heading = marked.lexer(markdown).find((token): token is Tokens.Heading => token.type === 'heading');
    return heading?.text.trim() || undefined;
}

/**
 * Local directory as a content source. Document ids are paths relative to
 * the root, with forward slashes.
 */
export class FileSystemSource implements ContentSource {
    public readonly name: string;
    private readonly config: FileSystemSourceConfig;
    private readonly rootPath: string;
    private readonly extensions: Set<string>;
    private readonly support: ConnectorSupport;

    constructor(
        config: FileSystemSourceConfig,
        options: { retry?: Partial<RetryOptions>; logger?: Logger } = {}
    ) {
        this.config = config;
        this.rootPath = path.resolve(config.rootPath);
        this.name = `filesystem:${this.rootPath}`;
        this.extensions = new Set(
            config.extensions.map(ext => ext.toLowerCase()).filter(ext => SUPPORTED_EXTENSIONS.has(ext))
        );
        this.support = new ConnectorSupport(this.name, { retry: { maxAttempts: 1, ...options.retry } }, options.logger);
    }

    public async listDocuments(): Promise<SourceListing> {
        let files: string[];
        try {
            const stats = await fs.stat(this.rootPath);
            if (!stats.isDirectory()) {
                throw new DocumentReadError(`Source root is not a directory: ${this.rootPath}`, this.rootPath);
            }
            files = [];
            await this.discoverFilesInDirectory(this.rootPath, files);
        } catch (error) {
            throw this.support.toUnavailable(error, 'list directory');
        }

        const pending: PendingDocument[] = files.map(filePath => ({
            id: toDocumentId(this.rootPath, filePath),
            read: () => this.parseFile(filePath)
        }));

        return this.support.collect(pending);
    }

    /**
     * A directory that cannot be read aborts the listing: skipping it would make
     * every document below it look deleted.
     */
    private async discoverFilesInDirectory(dirPath: string, files: string[]): Promise<void> {
        const entries = await fs.readdir(dirPath, { withFileTypes: true });

        for (const entry of entries) {
            const fullPath = path.join(dirPath, entry.name);

            if (entry.isFile() && this.isFileSupported(fullPath)) {
                files.push(fullPath);
            } else if (entry.isDirectory() && this.config.recursive) {
                await this.discoverFilesInDirectory(fullPath, files);
            }
        }
    }

    private isFileSupported(filePath: string): boolean {
        return this.extensions.has(path.extname(filePath).toLowerCase());
    }

    private async parseFile(filePath: string): Promise<Omit<DocumentInfo, 'id'>> {
        const ext = path.extname(filePath).toLowerCase();
        const stats = await fs.stat(filePath);
        const relativeDir = path.relative(this.rootPath, path.dirname(filePath));

        let content: string;
        let title = path.basename(filePath, path.extname(filePath));

        switch (ext) {
            case '.docx':
                content = await this.parseDocx(filePath);
                break;
            case '.md':
                content = await fs.readFile(filePath, 'utf-8');
                title = markdownTitle(content) ?? title;
                break;
            default:
                content = await fs.readFile(filePath, 'utf-8');
        }

        return {
            title,
            content,
            folderPath: relativeDir.split(path.sep).join('/'),
            sourceVersion: stats.mtime.toISOString(),
            metadata: {
                fileName: path.basename(filePath),
                fileType: ext.substring(1),
                fileSize: stats.size
            }
        };
    }

    private async parseDocx(filePath: string): Promise<string> {
        const buffer = await fs.readFile(filePath);
        const result = await mammoth.extractRawText({ buffer });
        return result.value;
    }
}
