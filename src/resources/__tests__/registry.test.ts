import { describe, it, expect } from 'vitest';
import { RESOURCE_TYPES, allResources } from '../index.js';

describe('resource registry', () => {
  it('registers every resource type under its own name', () => {
    for (const type of RESOURCE_TYPES) {
      expect(allResources[type].type).toBe(type);
      expect(allResources[type].description).toBeTruthy();
    }
  });

  it('declares the attributes that force replacement', () => {
    expect(allResources.elasticsearch_index_lifecycle.replaceOnChange).toEqual(['name']);
    expect(allResources.elasticsearch_security_api_key.replaceOnChange).toEqual(['name', 'expiration']);
    expect(allResources.elasticsearch_cluster_settings.replaceOnChange).toEqual([]);
  });
});
