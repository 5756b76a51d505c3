// Test setup and global configurations
process.env.LOG_SILENT = 'true';

jest.setTimeout(30000);
