import axios, { AxiosInstance } from 'axios';
import * as mammoth from 'mammoth';
import * as path from 'path';
import { SharePointSourceConfig } from '../../models/config';
import { DocumentInfo, SourceListing } from '../../models/document';
import { AuthenticationError } from '../../utils/errors';
import { Logger } from '../../utils/logger';
import { markdownTitle } from './fileSystem';
import { ConnectorSupport, ContentSource, PendingDocument, RetryOptions } from './base';

const GRAPH_SCOPE = 'https://graph.microsoft.com/.default';
const SUPPORTED_EXTENSIONS = new Set(['.docx', '.txt', '.md']);

export interface DriveItem {
    id: string;
    name: string;
    size?: number;
    webUrl?: string;
    lastModifiedDateTime?: string;
    folder?: { childCount?: number };
    file?: { mimeType?: string };
}

interface DriveItemPage {
    value?: DriveItem[];
    '@odata.nextLink'?: string;
}

interface TokenResponse {
    access_token?: string;
    expires_in?: number;
}

interface FoundItem {
    item: DriveItem;
    folderPath: string;
}

/**
 * SharePoint document library folder read through Microsoft Graph with
 * application (client credentials) permissions.
 */
export class SharePointSource implements ContentSource {
    public readonly name: string;
    private readonly config: SharePointSourceConfig;
    private readonly http: AxiosInstance;
    private readonly support: ConnectorSupport;
    private accessToken?: { value: string; expiresAt: number };
    private siteId?: string;

    constructor(
        config: SharePointSourceConfig,
        options: { http?: AxiosInstance; retry?: Partial<RetryOptions>; logger?: Logger } = {}
    ) {
        this.config = config;
        this.name = `sharepoint:${config.siteUrl}`;
        this.http = options.http ?? axios.create({ timeout: config.timeout });
        this.support = new ConnectorSupport(this.name, { timeoutMs: config.timeout, retry: options.retry }, options.logger);
    }

    public async listDocuments(): Promise<SourceListing> {
        const found: FoundItem[] = [];
        try {
            const siteId = await this.resolveSiteId();
            await this.walkFolder(this.rootChildrenUrl(siteId), '', found);
        } catch (error) {
            throw this.support.toUnavailable(error, 'list library folder');
        }

        const pending: PendingDocument[] = found.map(({ item, folderPath }) => ({
            id: item.id,
            read: () => this.readItem(item, folderPath)
        }));

        return this.support.collect(pending);
    }

    private rootChildrenUrl(siteId: string): string {
        const folder = this.config.folderPath.replace(/^\/+|\/+$/g, '');
        const base = `${this.config.graphBaseUrl}/sites/${siteId}/drive/root`;
        return folder
            ? `${base}:/${folder.split('/').map(encodeURIComponent).join('/')}:/children`
            : `${base}/children`;
    }

    private async walkFolder(childrenUrl: string, folderPath: string, found: FoundItem[]): Promise<void> {
        const siteId = await this.resolveSiteId();
        const children = await this.listChildren(childrenUrl);

        for (const child of children) {
            if (child.folder) {
                // System folders such as "_catalogs"
                if (child.name.startsWith('_')) continue;
                const childPath = folderPath ? `${folderPath}/${child.name}` : child.name;
                const url = `${this.config.graphBaseUrl}/sites/${siteId}/drive/items/${encodeURIComponent(child.id)}/children`;
                await this.walkFolder(url, childPath, found);
            } else if (child.file && SUPPORTED_EXTENSIONS.has(path.extname(child.name).toLowerCase())) {
                found.push({ item: child, folderPath });
            }
        }
    }

    private async listChildren(firstPageUrl: string): Promise<DriveItem[]> {
        const items: DriveItem[] = [];
        let nextUrl: string | undefined = firstPageUrl;

        while (nextUrl) {
            const url: string = nextUrl;
            const token = await this.getAccessToken();
            const response = await this.support.executeWithRetry(
                () => this.http.get<DriveItemPage>(url, { headers: { Authorization: `Bearer ${token}` } }),
                'list folder children'
            );
            items.push(...(response.data.value ?? []));
            nextUrl = response.data['@odata.nextLink'];
        }

        return items;
    }

    private async readItem(item: DriveItem, folderPath: string): Promise<Omit<DocumentInfo, 'id'>> {
        const ext = path.extname(item.name).toLowerCase();
        const buffer = await this.download(item.id);

        let content: string;
        let title = path.basename(item.name, path.extname(item.name));
        if (ext === '.docx') {
            content = (await mammoth.extractRawText({ buffer })).value;
        } else {
            content = buffer.toString('utf-8');
            if (ext === '.md') {
                title = markdownTitle(content) ?? title;
            }
        }

        return {
            title,
            content,
            folderPath,
            sourceVersion: item.lastModifiedDateTime,
            metadata: {
                fileName: item.name,
                fileSize: item.size ?? null,
                dataSource: 'sharepoint',
                fileUrl: item.webUrl ?? null
            }
        };
    }

    private async download(itemId: string): Promise<Buffer> {
        const siteId = await this.resolveSiteId();
        const token = await this.getAccessToken();
        const response = await this.http.get<ArrayBuffer>(
            `${this.config.graphBaseUrl}/sites/${siteId}/drive/items/${encodeURIComponent(itemId)}/content`,
            { headers: { Authorization: `Bearer ${token}` }, responseType: 'arraybuffer' }
        );
        return Buffer.from(response.data);
    }

    private async resolveSiteId(): Promise<string> {
        if (this.siteId) {
            return this.siteId;
        }

        const site = new URL(this.config.siteUrl);
        const sitePath = site.pathname.replace(/\/+$/, '');
        const token = await this.getAccessToken();
        const response = await this.support.executeWithRetry(
            () => this.http.get<{ id?: string }>(
                `${this.config.graphBaseUrl}/sites/${site.hostname}${sitePath ? `:${sitePath}` : ''}`,
                { headers: { Authorization: `Bearer ${token}` } }
            ),
            'resolve site'
        );
        if (!response.data.id) {
            throw new AuthenticationError(`Site ${this.config.siteUrl} could not be resolved`, this.name);
        }
        this.siteId = response.data.id;
        return this.siteId;
    }

    private async getAccessToken(): Promise<string> {
        // Refresh a minute before expiry
        if (this.accessToken && this.accessToken.expiresAt - 60000 > Date.now()) {
            return this.accessToken.value;
        }

        const body = new URLSearchParams({
            client_id: this.config.clientId,
            client_secret: this.config.clientSecret,
            scope: GRAPH_SCOPE,
            grant_type: 'client_credentials'
        });
        const response = await this.support.executeWithRetry(
            () => this.http.post<TokenResponse>(
                `${this.config.authorityUrl}/${encodeURIComponent(this.config.tenantId)}/oauth2/v2.0/token`,
                body.toString(),
                { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
            ),
            'acquire access token'
        );

        const token = response.data.access_token;
        if (!token) {
            throw new AuthenticationError('Token endpoint returned no access token', this.name);
        }
        this.accessToken = { value: token, expiresAt: Date.now() + (response.data.expires_in ?? 3600) * 1000 };
        return token;
    }
}
