import { DRIVE_MIME_TYPES, GoogleDriveSource } from '../../../data/connectors/googleDrive';
import { GoogleDriveSourceConfig } from '../../../models/config';
import { SourceUnavailableError } from '../../../utils/errors';
import { createFakeHttp, FakeRequest, FakeResponse, notFound, text } from './fakeHttp';

const config: GoogleDriveSourceConfig = {
    type: 'google-drive',
    folderId: 'root-folder',
    accessToken: 'test-token',
    apiBaseUrl: 'https://drive.example/v3',
    timeout: 5000,
    pageSize: 2
};

const fastRetry = { maxAttempts: 2, baseDelay: 1, maxDelay: 1 };

function driveApi(overrides: (request: FakeRequest) => FakeResponse | undefined = () => undefined) {
    return (request: FakeRequest): FakeResponse => {
        const override = overrides(request);
        if (override) {
            return override;
        }

        if (request.url === '/files' && request.params.q === "'root-folder' in parents and trashed=false") {
            if (request.params.pageToken === 'page-2') {
                return {
                    data: {
                        files: [
                            { id: 'file-g', name: 'Plan', mimeType: DRIVE_MIME_TYPES.googleDoc, modifiedTime: '2024-02-01T00:00:00.000Z' },
                            { id: 'file-img', name: 'photo.png', mimeType: 'image/png' }
                        ]
                    }
                };
            }
            return {
                data: {
                    files: [
                        { id: 'file-a', name: 'a.txt', mimeType: DRIVE_MIME_TYPES.plainText, modifiedTime: '2024-01-01T00:00:00.000Z' },
                        { id: 'folder-sub', name: 'Reports', mimeType: DRIVE_MIME_TYPES.folder }
                    ],
                    nextPageToken: 'page-2'
                }
            };
        }
        if (request.url === '/files' && request.params.q === "'folder-sub' in parents and trashed=false") {
            return { data: { files: [{ id: 'file-m', name: 'notes.md', mimeType: DRIVE_MIME_TYPES.markdown }] } };
        }
        if (request.url === '/files/file-a' && request.params.alt === 'media') {
            return text('alpha');
        }
        if (request.url === '/files/file-m' && request.params.alt === 'media') {
            return text('# Notes');
        }
        if (request.url === '/files/file-g/export' && request.params.mimeType === 'text/plain') {
            return text('\uFEFFplan text');
        }
        return notFound;
    };
}

describe('GoogleDriveSource', () => {
    it('should walk folders across pages and read every supported file', async () => {
        const { http, requests } = createFakeHttp(driveApi());

        const listing = await new GoogleDriveSource(config, { http, retry: fastRetry }).listDocuments();

        expect(listing.unreadable).toEqual([]);
        expect(listing.documents).toEqual([
            {
                id: 'file-a',
                title: 'a',
                content: 'alpha',
                folderPath: '',
                sourceVersion: '2024-01-01T00:00:00.000Z',
                metadata: {
                    fileName: 'a.txt',
                    mimeType: 'text/plain',
                    dataSource: 'google-drive',
                    fileUrl: 'https://drive.google.com/file/d/file-a/view'
                }
            },
            {
                id: 'file-g',
                title: 'Plan',
                content: 'plan text',
                folderPath: '',
                sourceVersion: '2024-02-01T00:00:00.000Z',
                metadata: {
                    fileName: 'Plan',
                    mimeType: DRIVE_MIME_TYPES.googleDoc,
                    dataSource: 'google-drive',
                    fileUrl: 'https://drive.google.com/file/d/file-g/view'
                }
            },
            {
                id: 'file-m',
                title: 'notes',
                content: '# Notes',
                folderPath: 'Reports',
                sourceVersion: undefined,
                metadata: {
                    fileName: 'notes.md',
                    mimeType: 'text/markdown',
                    dataSource: 'google-drive',
                    fileUrl: 'https://drive.google.com/file/d/file-m/view'
                }
            }
        ]);

        const listCalls = requests.filter(request => request.url === '/files');
        expect(listCalls.map(request => request.params.pageToken)).toEqual([undefined, 'page-2', undefined]);
        expect(listCalls[0].params.pageSize).toBe('2');
    });

    it('should report a file that fails to download as unreadable', async () => {
        const { http } = createFakeHttp(driveApi(request => (request.url === '/files/file-m' ? notFound : undefined)));

        const listing = await new GoogleDriveSource(config, { http, retry: fastRetry }).listDocuments();

        expect(listing.documents.map(document => document.id)).toEqual(['file-a', 'file-g']);
        expect(listing.unreadable).toEqual([{
            id: 'file-m',
            reason: 'Request failed with status code 404',
            errorCode: 'DOCUMENT_READ_ERROR',
            retryable: true
        }]);
    });

    it('should fail the listing when the API rejects the token', async () => {
        const { http } = createFakeHttp(() => ({ status: 401, data: { error: 'invalid_token' } }));

        const listing = new GoogleDriveSource(config, { http, retry: fastRetry }).listDocuments();

        await expect(listing).rejects.toThrow(SourceUnavailableError);
        await expect(listing).rejects.toMatchObject({ context: expect.objectContaining({ causeCode: 'AUTHENTICATION_ERROR' }) });
    });

    it('should retry a listing page after a server error', async () => {
        let failures = 1;
        const { http, requests } = createFakeHttp(driveApi(request => {
            if (request.url === '/files' && failures > 0) {
                failures--;
                return { status: 503, data: {} };
            }
            return undefined;
        }));

        const listing = await new GoogleDriveSource(config, { http, retry: fastRetry }).listDocuments();

        expect(listing.documents).toHaveLength(3);
        expect(requests.filter(request => request.url === '/files')).toHaveLength(4);
    });
});
