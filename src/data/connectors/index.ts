import { DeepReadonly, SourceConfig } from '../../models/config';
import { Logger } from '../../utils/logger';
import { ContentSource } from './base';
import { FileSystemSource } from './fileSystem';
import { GoogleDriveSource } from './googleDrive';
import { SharePointSource } from './sharePoint';

export function createContentSource(config: DeepReadonly<SourceConfig>, logger?: Logger): ContentSource {
    switch (config.type) {
        case 'filesystem':
            return new FileSystemSource({ ...config, extensions: [...config.extensions] }, { logger });
        case 'google-drive':
            return new GoogleDriveSource({ ...config }, { logger });
        case 'sharepoint':
            return new SharePointSource({ ...config }, { logger });
    }
}

export { ConnectorSupport } from './base';
export type { ContentSource, PendingDocument, RetryOptions } from './base';
export { FileSystemSource } from './fileSystem';
export { GoogleDriveSource } from './googleDrive';
export { SharePointSource } from './sharePoint';
