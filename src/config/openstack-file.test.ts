import { describe, expect, it } from 'vitest';
import { parseOpenStackFileConfig } from './openstack-file';

describe('parseOpenStackFileConfig', () => {
  it('fills domain, region and interface defaults', () => {
    expect(
      parseOpenStackFileConfig({
        AUTH_URL: 'https://keystone.test:5000/v3',
        USERNAME: 'inventory-reader',
        PASSWORD: 'test-secret',
        PROJECT: 'admin',
      })
    ).toEqual({
      authUrl: 'https://keystone.test:5000/v3',
      username: 'inventory-reader',
      password: 'test-secret',
      projectName: 'admin',
      userDomain: 'Default',
      projectDomain: 'Default',
      region: 'RegionOne',
      interface: 'public',
    });
  });

  it('keeps a separate project domain when given', () => {
    const creds = parseOpenStackFileConfig({
      AUTH_URL: 'https://keystone.test:5000/v3',
      USERNAME: 'inventory-reader',
      PASSWORD: 'test-secret',
      PROJECT: 'ops',
      DOMAIN: 'users',
      PROJECT_DOMAIN: 'projects',
      REGION: 'east',
      INTERFACE: 'internal',
    });

    expect(creds).toMatchObject({ userDomain: 'users', projectDomain: 'projects', region: 'east', interface: 'internal' });
  });

  it('lists every problem with the file', () => {
    expect(() => parseOpenStackFileConfig({ AUTH_URL: 'not a url', USERNAME: 'u' }, 'config file test.json')).toThrow(
      'Invalid OpenStack config file test.json: AUTH_URL: Invalid url; PASSWORD: Required; PROJECT: Required'
    );
  });

  it('rejects a file that is not an object', () => {
    expect(() => parseOpenStackFileConfig([])).toThrow('Invalid OpenStack config file: (root): Expected object, received array');
  });
});
