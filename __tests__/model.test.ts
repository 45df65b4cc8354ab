/**
 * Result Model Tests
 *
 * Mapping of response bodies into APIResponse, EntityUniqueId and Platform.
 */

import { APIResponse } from '../structs/APIResponse';
import { EntityUniqueId } from '../structs/EntityUniqueId';
import { Platform } from '../structs/Platform';
import { isPayload } from '../interfaces/ApiPayload';
import { loadFixture } from './helpers/fakeUpstream';

function fixtureResponse(): APIResponse {
  const body = loadFixture('links-response.json');
  if (!isPayload(body)) throw new Error('fixture must be an object');
  return APIResponse.from(body);
}

describe('APIResponse.from', () => {
  it('maps the primary entity with all its fields', () => {
    const entity = fixtureResponse().primaryEntity;

    expect(entity).toBeInstanceOf(EntityUniqueId);
    expect(entity).toMatchObject({
      uniqueId: 'SPOTIFY_SONG::xyz',
      id: 'xyz',
      type: 'song',
      title: 'Test Song',
      artistName: 'Test Artist',
      thumbnailUrl: 'https://images.example.com/xyz.jpg',
      thumbnailWidth: 640,
      thumbnailHeight: 640,
      apiProvider: 'spotify'
    });
  });

  it('keeps entities of known providers only', () => {
    const response = fixtureResponse();

    expect(response.getEntity('ITUNES_SONG::123')?.platforms).toEqual(['appleMusic', 'itunes']);
    expect(response.getEntity('UNKNOWN_SONG::1')).toBeUndefined();
  });

  it('maps platform links', () => {
    const link = fixtureResponse().getLink('appleMusic');

    expect(link).toBeInstanceOf(Platform);
    expect(link).toMatchObject({
      name: 'appleMusic',
      country: 'US',
      entityUniqueId: 'ITUNES_SONG::123',
      url: 'https://music.example.com/us/album/_/1?i=123',
      nativeAppUriMobile: 'music://music.example.com/us/album/_/1?i=123',
      nativeAppUriDesktop: undefined
    });
  });

  it('returns empty collections when the maps are missing', () => {
    const response = APIResponse.from({ entityUniqueId: 'A', userCountry: 'SE' });

    expect(response.entitiesByUniqueId).toEqual([]);
    expect(response.linksByPlatform).toEqual([]);
    expect(response.userCountry).toBe('SE');
    expect(response.primaryEntity).toBeUndefined();
  });

  it('freezes its collections', () => {
    const response = fixtureResponse();

    expect(Object.isFrozen(response.linksByPlatform)).toBe(true);
    expect(Object.isFrozen(response.entitiesByUniqueId)).toBe(true);
    expect(Object.isFrozen(response.primaryEntity?.platforms)).toBe(true);
  });
});

describe('EntityUniqueId.from', () => {
  it('falls back to the unique id when the entity has no id', () => {
    const entity = EntityUniqueId.from('DEEZER_SONG::9', { apiProvider: 'deezer', type: 'single' });

    expect(entity?.id).toBe('DEEZER_SONG::9');
    expect(entity?.type).toBeUndefined();
    expect(entity?.platforms).toEqual([]);
  });

  it('ignores values that are not objects', () => {
    expect(EntityUniqueId.from('X', 'not an entity')).toBeUndefined();
  });
});

describe('Platform.from', () => {
  it('drops entries without a url', () => {
    expect(Platform.from('tidal', { country: 'US' })).toBeUndefined();
  });

  it('drops unknown platform names', () => {
    expect(Platform.from('futurePlatform', { url: 'https://future.example.com/xyz' })).toBeUndefined();
  });
});
