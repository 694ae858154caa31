export * from './param-map.model';
export * from './xml-map.model';
export * from './gateway-result.model';
