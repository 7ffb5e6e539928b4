export enum NodeEnvs {
  Dev = 'development',
  Test = 'test',
  Production = 'production',
}

export const APP_VERSION = '1.0.0';

export const SUPPORTED_FILE_TYPES = ['pdf', 'docx', 'doc', 'txt'] as const;

export type SupportedFileType = (typeof SUPPORTED_FILE_TYPES)[number];
