export * from './command-runner';
export * from './local-environment';
export * from './package-installer';
export * from './cargo-driver';
export * from './buildx-builder';
export * from './registry-client';
export * from './env-credentials';
export * from './fs-context';
