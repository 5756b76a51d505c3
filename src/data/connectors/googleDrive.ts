import axios, { AxiosInstance } from 'axios';
import * as mammoth from 'mammoth';
import { GoogleDriveSourceConfig } from '../../models/config';
import { DocumentInfo, SourceListing } from '../../models/document';
import { DocumentReadError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { ConnectorSupport, ContentSource, PendingDocument, RetryOptions } from './base';

export const DRIVE_MIME_TYPES = {
    folder: 'application/vnd.google-apps.folder',
    googleDoc: 'application/vnd.google-apps.document',
    docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
    plainText: 'text/plain',
    markdown: 'text/markdown'
} as const;

const SUPPORTED_FILE_TYPES = new Set<string>([
    DRIVE_MIME_TYPES.googleDoc,
    DRIVE_MIME_TYPES.docx,
    DRIVE_MIME_TYPES.plainText,
    DRIVE_MIME_TYPES.markdown
]);

export interface DriveFile {
    id: string;
    name: string;
    mimeType: string;
    modifiedTime?: string;
    size?: string;
}

interface DriveFileList {
    files?: DriveFile[];
    nextPageToken?: string;
}

interface FoundFile {
    file: DriveFile;
    folderPath: string;
}

function stripExtension(name: string): string {
    return name.replace(/\.(docx|txt|md)$/i, '');
}

/**
 * Google Drive folder (and its subfolders) read through the Drive v3 REST API.
 */
export class GoogleDriveSource implements ContentSource {
    public readonly name: string;
    private readonly config: GoogleDriveSourceConfig;
    private readonly http: AxiosInstance;
    private readonly support: ConnectorSupport;

    constructor(
        config: GoogleDriveSourceConfig,
        options: { http?: AxiosInstance; retry?: Partial<RetryOptions>; logger?: Logger } = {}
    ) {
        this.config = config;
        this.name = `google-drive:${config.folderId}`;
        this.http = options.http ?? axios.create({
            baseURL: config.apiBaseUrl,
            timeout: config.timeout,
            headers: { Authorization: `Bearer ${config.accessToken}` }
        });
        this.support = new ConnectorSupport(this.name, { timeoutMs: config.timeout, retry: options.retry }, options.logger);
    }

    public async listDocuments(): Promise<SourceListing> {
        const found: FoundFile[] = [];
        try {
            await this.walkFolder(this.config.folderId, '', found);
        } catch (error) {
            throw this.support.toUnavailable(error, 'list folder');
        }

        const pending: PendingDocument[] = found.map(({ file, folderPath }) => ({
            id: file.id,
            read: () => this.readFile(file, folderPath)
        }));

        return this.support.collect(pending);
    }

    private async walkFolder(folderId: string, folderPath: string, found: FoundFile[]): Promise<void> {
        const children = await this.listChildren(folderId);

        for (const child of children) {
            if (child.mimeType === DRIVE_MIME_TYPES.folder) {
                const childPath = folderPath ? `${folderPath}/${child.name}` : child.name;
                await this.walkFolder(child.id, childPath, found);
            } else if (SUPPORTED_FILE_TYPES.has(child.mimeType)) {
                found.push({ file: child, folderPath });
            }
        }
    }

    private async listChildren(folderId: string): Promise<DriveFile[]> {
        const files: DriveFile[] = [];
        let pageToken: string | undefined;

        do {
            const response = await this.support.executeWithRetry(
                () => this.http.get<DriveFileList>('/files', {
                    params: {
                        q: `'${folderId.replace(/'/g, "\\'")}' in parents and trashed=false`,
                        fields: 'nextPageToken, files(id, name, mimeType, modifiedTime, size)',
                        pageSize: this.config.pageSize,
                        pageToken
                    }
                }),
                `list folder ${folderId}`
            );
            files.push(...(response.data.files ?? []));
            pageToken = response.data.nextPageToken;
        } while (pageToken);

        return files;
    }

    private async readFile(file: DriveFile, folderPath: string): Promise<Omit<DocumentInfo, 'id'>> {
        return {
            title: stripExtension(file.name),
            content: await this.fetchContent(file),
            folderPath,
            sourceVersion: file.modifiedTime,
            metadata: {
                fileName: file.name,
                mimeType: file.mimeType,
                dataSource: 'google-drive',
                fileUrl: `https://drive.google.com/file/d/${file.id}/view`
            }
        };
    }

    private async fetchContent(file: DriveFile): Promise<string> {
        switch (file.mimeType) {
            case DRIVE_MIME_TYPES.googleDoc: {
                const response = await this.http.get<ArrayBuffer>(`/files/${encodeURIComponent(file.id)}/export`, {
                    params: { mimeType: 'text/plain' },
                    responseType: 'arraybuffer'
                });
                // Exports start with a byte order mark
                return Buffer.from(response.data).toString('utf-8').replace(/^\uFEFF/, '');
            }
            case DRIVE_MIME_TYPES.docx: {
                const buffer = await this.download(file.id);
                const result = await mammoth.extractRawText({ buffer });
                return result.value;
            }
            case DRIVE_MIME_TYPES.plainText:
            case DRIVE_MIME_TYPES.markdown:
                return (await this.download(file.id)).toString('utf-8');
            default:
                throw new DocumentReadError(`Unsupported file type: ${file.mimeType}`, file.id);
        }
    }

    private async download(fileId: string): Promise<Buffer> {
        const response = await this.http.get<ArrayBuffer>(`/files/${encodeURIComponent(fileId)}`, {
            params: { alt: 'media' },
            responseType: 'arraybuffer'
        });
        return Buffer.from(response.data);
    }
}
