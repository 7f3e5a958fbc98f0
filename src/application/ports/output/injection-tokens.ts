// Injection tokens (string symbols for DI)
export const FILE_STORAGE_PORT = 'FileStoragePort';
export const PARAMETER_STORE_PORT = 'ParameterStorePort';
export const IMAGE_CODEC_PORT = 'ImageCodecPort';
export const EVENT_PUBLISHER_PORT = 'EventPublisherPort';
