export * from './document-codec.js';
export * from './constraint-group-codec.js';
export * from './constraints-list-codec.js';
export * from './lease-preference-codec.js';
export * from './marshalable-zone-config.js';
export * from './zone-config-document.js';
export * from './zone-config-yaml.js';
export * from './zone-config-json.js';
