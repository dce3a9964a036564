import {describe, expect, it} from 'vitest';

import {listOpenApiEndpoints, loadOpenApiDocument, ok} from '../index';

const petStore = {
  openapi: '3.0.0',
  info: {title: 'Pet store', version: '1.0.0'},
  paths: {
    '/pets': {
      parameters: [{name: 'limit', in: 'query'}],
      get: {operationId: 'listPets', summary: 'List all pets'},
      post: {operationId: 'createPet'}
    },
    '/pets/{petId}': {
      summary: 'A single pet',
      get: {operationId: 'showPetById', description: 'Info for a specific pet'}
    }
  }
};

const ownersYaml = `swagger: "2.0"
info:
  title: Owners
paths:
  /owners:
    x-internal: true
    delete:
      operationId: deleteOwners
    patch: {}
  /owners/{ownerId}:
    head:
      summary: Check an owner
`;

describe('loadOpenApiDocument', () => {
  it('reads JSON', () => {
    expect(loadOpenApiDocument(JSON.stringify(petStore))).toEqual(ok({document: petStore, format: 'json'}));
  });

  it('falls back to YAML', () => {
    const loaded = loadOpenApiDocument(ownersYaml);

    expect(loaded.ok ? loaded.value.format : undefined).toBe('yaml');
    expect(loaded.ok ? loaded.value.document : undefined).toMatchObject({swagger: '2.0', info: {title: 'Owners'}});
  });

  it('rejects text that is neither', () => {
    const loaded = loadOpenApiDocument('paths: [unclosed');

    expect(loaded.ok ? undefined : loaded.error.code).toBe('format_error');
    expect(loaded.ok ? undefined : loaded.error.message).toMatch(/^OpenAPI description is neither JSON nor YAML: /u);
  });
});

describe('listOpenApiEndpoints', () => {
  it('lists get before post for a minimal document', () => {
    const loaded = loadOpenApiDocument('{"paths": {"/pets": {"get": {}, "post": {}}}}');
    if (!loaded.ok) throw new Error(loaded.error.message);

    expect(listOpenApiEndpoints(loaded.value.document)).toEqual(
      ok([
        {method: 'GET', path: '/pets'},
        {method: 'POST', path: '/pets'}
      ])
    );
  });

  it('lists one endpoint per path and method in document order', () => {
    expect(listOpenApiEndpoints(petStore)).toEqual(
      ok([
        {method: 'GET', path: '/pets', operationId: 'listPets', summary: 'List all pets'},
        {method: 'POST', path: '/pets', operationId: 'createPet'},
        {method: 'GET', path: '/pets/{petId}', operationId: 'showPetById', description: 'Info for a specific pet'}
      ])
    );
  });

  it('lists a YAML description', () => {
    const loaded = loadOpenApiDocument(ownersYaml);
    if (!loaded.ok) throw new Error(loaded.error.message);

    expect(listOpenApiEndpoints(loaded.value.document)).toEqual(
      ok([
        {method: 'DELETE', path: '/owners', operationId: 'deleteOwners'},
        {method: 'PATCH', path: '/owners'},
        {method: 'HEAD', path: '/owners/{ownerId}', summary: 'Check an owner'}
      ])
    );
  });

  it('only takes lower-case method keys', () => {
    expect(listOpenApiEndpoints({paths: {'/a': {GET: {}, trace: {}}}})).toEqual(ok([{method: 'TRACE', path: '/a'}]));
  });

  it('returns nothing for empty paths', () => {
    expect(listOpenApiEndpoints({openapi: '3.1.0', paths: {}})).toEqual(ok([]));
  });

  it('rejects a document without paths', () => {
    expect(listOpenApiEndpoints({openapi: '3.0.0'})).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'OpenAPI document has no paths section'}
    });
  });

  it('rejects paths that are not an object', () => {
    expect(listOpenApiEndpoints({paths: ['/pets']})).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'OpenAPI paths section is not an object'}
    });
  });

  it('rejects a path item that is not an object', () => {
    expect(listOpenApiEndpoints({paths: {'/pets': 'get'}})).toEqual({
      ok: false,
      error: {code: 'format_error', message: 'OpenAPI path /pets is not an object'}
    });
  });
});
