import { describe, it, expect, beforeEach } from 'vitest';
import { ChangeTopics, type ChangeNotification, type InProcessChangeBus } from '@tonearm/events';
import type { MemoryTransport } from '@tonearm/logging';
import { TransientConnectivityError, defaultProfileConfig, type ProfileConfig } from '@tonearm/store';
import { ConfigAccessService } from '../src/config-access-service';
import { InvalidSettingError } from '../src/errors';
import { ProfileConfigService, isEmergencyProfile } from '../src/profile-config-service';
import { InMemoryProfileRepository, captureLogger, messagesAt, quietBus } from './helpers';

describe('ProfileConfigService', () => {
	let repository: InMemoryProfileRepository;
	let bus: InProcessChangeBus;
	let access: ConfigAccessService<number, ProfileConfig>;
	let transport: MemoryTransport;
	let service: ProfileConfigService;

	beforeEach(() => {
		repository = new InMemoryProfileRepository();
		bus = quietBus();
		access = new ConfigAccessService<number, ProfileConfig>({
			name: 'ProfileConfig',
			repository,
			bus,
			topic: ChangeTopics.ProfileConfig,
			isKey: (key): key is number => typeof key === 'number',
			keyOf: (record) => record.profileId,
			createDefault: (profileId) => defaultProfileConfig(profileId),
			origin: 'test-origin',
			log: captureLogger('ProfileConfigAccess').log
		});
		const captured = captureLogger('ProfileConfig');
		transport = captured.transport;
		service = new ProfileConfigService(access, bus, captured.log);
	});

	describe('emergency profiles', () => {
		it('should treat negative ids as emergency profiles', () => {
			expect(isEmergencyProfile(-1)).toBe(true);
			expect(isEmergencyProfile(0)).toBe(false);
		});

		it('should serve defaults without touching the store', async () => {
			const config = await service.getProfileConfig(-2);

			expect(config).toEqual(defaultProfileConfig(-2));
			expect(repository.fetchCount).toBe(0);
		});

		it('should skip updates and say so', async () => {
			await service.updateVolume(-2, 80);

			expect(repository.updateCount).toBe(0);
			expect(messagesAt(transport, 30)).toEqual(['Skipped Update Of Emergency Profile']);
		});

		it('should report an empty blacklist', async () => {
			await expect(service.getBlacklistedDirectories(-2)).resolves.toEqual([]);
			expect(repository.fetchCount).toBe(0);
		});
	});

	describe('updateVolume()', () => {
		it('should write a change larger than one step', async () => {
			repository.seed(1, { lastVolume: 50 });

			await service.updateVolume(1, 55);

			expect(repository.records.get(1)?.lastVolume).toBe(55);
			expect(repository.updateCount).toBe(1);
		});

		it('should skip a change of one step or less', async () => {
			repository.seed(1, { lastVolume: 50 });

			await service.updateVolume(1, 51);
			await service.updateVolume(1, 49);
			await service.updateVolume(1, 50);

			expect(repository.updateCount).toBe(0);
			expect(repository.records.get(1)?.lastVolume).toBe(50);
		});

		it('should reject volumes outside 0 to 100', async () => {
			repository.seed(1);

			await expect(service.updateVolume(1, 101)).rejects.toThrow(
				'Volume must be an integer from 0 to 100, got 101'
			);
			await expect(service.updateVolume(1, 12.5)).rejects.toBeInstanceOf(InvalidSettingError);
			expect(repository.fetchCount).toBe(0);
		});
	});

	describe('JSON settings', () => {
		it('should store valid theme JSON as given', async () => {
			repository.seed(1);

			await service.updateTheme(1, '{"accent":"#336699"}');

			expect(repository.records.get(1)?.theme).toBe('{"accent":"#336699"}');
		});

		it('should reject text that is not JSON', async () => {
			repository.seed(1);

			const error = await service.updateViewState(1, '{tracks: grid').catch((e: unknown) => e);

			expect(error).toBeInstanceOf(InvalidSettingError);
			expect(error).toMatchObject({ setting: 'viewState' });
			expect(repository.updateCount).toBe(0);
		});

		it('should update sort state and equalizer presets', async () => {
			repository.seed(1);

			await service.updateSortState(1, '{"library":{"field":"artist","order":"desc"}}');
			await service.updateEqualizer(1, '{"rock":[3,1,0,-1,2]}');

			expect(repository.records.get(1)).toMatchObject({
				sortingState: '{"library":{"field":"artist","order":"desc"}}',
				equalizerPresets: '{"rock":[3,1,0,-1,2]}'
			});
		});
	});

	describe('updateProfileConfig()', () => {
		it('should keep the stored id and profile id', async () => {
			const seeded = repository.seed(4);

			await service.updateProfileConfig({ ...seeded, id: 99, dynamicPause: true, lastVolume: 20 });

			expect(repository.records.get(4)).toMatchObject({ id: seeded.id, profileId: 4, dynamicPause: true, lastVolume: 20 });
		});

		it('should deduplicate the blacklist', async () => {
			const seeded = repository.seed(4);

			await service.updateProfileConfig({
				...seeded,
				blacklistDirectory: ['/music/Podcasts/', '/MUSIC/podcasts', '', '/music/Audiobooks']
			});

			expect(repository.records.get(4)?.blacklistDirectory).toEqual(['/music/Podcasts', '/music/Audiobooks']);
		});
	});

	describe('when the stored record cannot be read', () => {
		it('should refuse to write the fallback defaults over it', async () => {
			const seeded = repository.seed(3, {
				lastVolume: 70,
				theme: '{"accent":"#ff8800"}',
				blacklistDirectory: ['/music/podcasts']
			});
			repository.failFetches(1, new Error('connection refused'));

			await expect(service.updateVolume(3, 20)).rejects.toThrow(
				'ProfileConfig 3 could not be read, update not applied'
			);

			expect(repository.updateCount).toBe(0);
			expect(repository.records.get(3)).toBe(seeded);
			await expect(service.getProfileConfig(3)).resolves.toBe(seeded);
		});

		it('should refuse blacklist edits with a store error', async () => {
			repository.seed(3);
			repository.failFetches(1, new Error('connection refused'));

			await expect(service.addBlacklistDirectory(3, '/music/Live')).rejects.toBeInstanceOf(
				TransientConnectivityError
			);
			expect(repository.updateCount).toBe(0);
		});
	});

	it('should update playback settings', async () => {
		repository.seed(1);

		await service.updatePlaybackSettings(1, true);

		expect(repository.records.get(1)?.dynamicPause).toBe(true);
	});

	it('should reset a profile to its defaults', async () => {
		const seeded = repository.seed(6, { lastVolume: 90, theme: '{"accent":"red"}', blacklistDirectory: ['/tmp/x'] });

		await service.resetProfileToDefaults(6);

		expect(repository.records.get(6)).toEqual(defaultProfileConfig(6, seeded.id));
		expect(messagesAt(transport, 30)).toEqual(['Profile Config Reset To Defaults']);
	});

	describe('blacklist', () => {
		it('should add a normalised directory and announce it once', async () => {
			repository.seed(1);
			const received: ChangeNotification[] = [];
			bus.subscribe(ChangeTopics.Blacklist, (notification) => {
				received.push(notification);
			});

			await service.addBlacklistDirectory(1, '  /music/Live/  ');
			await service.addBlacklistDirectory(1, '/MUSIC/live');
			await bus.drain();

			expect(repository.records.get(1)?.blacklistDirectory).toEqual(['/music/Live']);
			expect(received).toHaveLength(1);
			expect(received[0]).toMatchObject({ key: 1, origin: 'test-origin' });
		});

		it('should remove a directory regardless of case', async () => {
			repository.seed(1, { blacklistDirectory: ['/music/Live', '/music/Demos'] });

			await service.removeBlacklistDirectory(1, '/MUSIC/LIVE/');

			await expect(service.getBlacklistedDirectories(1)).resolves.toEqual(['/music/Demos']);
		});

		it('should not write when removing a directory that is not listed', async () => {
			repository.seed(1, { blacklistDirectory: ['/music/Live'] });

			await service.removeBlacklistDirectory(1, '/music/Other');

			expect(repository.updateCount).toBe(0);
		});

		it('should reject an empty path', async () => {
			await expect(service.addBlacklistDirectory(1, '   ')).rejects.toThrow('Blacklist path cannot be empty');
		});

		it('should edit the stored record rather than a cached copy', async () => {
			repository.seed(1);
			await service.getProfileConfig(1);
			const stored = repository.records.get(1);
			if (!stored) {
				throw new Error('seeded record missing');
			}
			repository.records.set(1, { ...stored, blacklistDirectory: ['/music/Elsewhere'] });

			await service.addBlacklistDirectory(1, '/music/Live');

			expect(repository.records.get(1)?.blacklistDirectory).toEqual(['/music/Elsewhere', '/music/Live']);
			expect(repository.fetchCount).toBe(2);
		});
	});
});
