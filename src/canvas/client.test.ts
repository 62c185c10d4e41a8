import {describe, expect, test, afterEach} from '@jest/globals';
import {start, FakeServer} from '../fakeserver/server';
import {Client, toDeviceState} from './client';

describe('client', () => {
  let server: FakeServer;

  afterEach(async () => {
    await server.stop();
  });

  test('get device info', async () => {
    server = start();
    const client = new Client(server.host);

    const deviceInfo = await client.getDeviceInfo();
    expect(deviceInfo).toEqual({
      name: 'Hallway Canvas',
      version: '1.4.2',
      board_model: 'CNV-B1',
      screen_model: 'EL073TF1',
      network_type: 'wifi',
      sta_ssid: 'test-network',
      sta_ip: '192.168.1.50',
      width: 480,
      height: 800,
      battery: 76,
      total_size: 1400000000,
      free_size: 200000000,
      sleep_duration: 86400,
      max_idle: 300,
      idx_wake_sens: 3,
      image: '/gallery/default/sunset.jpg',
      next_time: 1767225600,
      gallery: 'default',
      playlist: '',
      play_type: 0,
      fs_ready: true,
    });
    expect(Object.isFrozen(deviceInfo)).toBe(true);
  });

  test('device info is null when the device returns 500', async () => {
    server = start({holdDeviceInfo: true});
    const client = new Client(server.host);
    const request = client.getDeviceInfo();
    await server.waitForARequest();

    server.deviceInfoRequests.respondWith.error500();
    await expect(request).resolves.toBe(null);
  });

  test('device info is null when the response is not JSON', async () => {
    server = start({holdDeviceInfo: true});
    const client = new Client(server.host);
    const request = client.getDeviceInfo();
    await server.waitForARequest();

    server.deviceInfoRequests.respondWith.notJson();
    await expect(request).resolves.toBe(null);
  });

  test('device info is null when the request times out', async () => {
    server = start({holdDeviceInfo: true});
    const client = new Client(server.host, undefined, 50);

    await expect(client.getDeviceInfo()).resolves.toBe(null);
    expect(server.deviceInfoRequests.length).toEqual(1);
  });

  test('device info is null when nothing is listening', async () => {
    server = start();
    const client = new Client('http://127.0.0.1:1');

    await expect(client.getDeviceInfo()).resolves.toBe(null);
  });

  test('send commands', async () => {
    server = start();
    const client = new Client(server.host);

    await expect(client.sendCommand('show_next')).resolves.toBe(true);
    await expect(client.sendCommand('reboot')).resolves.toBe(true);
    await expect(client.sendCommand('clear_screen')).resolves.toBe(true);
    await expect(client.sendCommand('whistle')).resolves.toBe(true);
    await expect(client.sendCommand('sleep')).resolves.toBe(true);

    expect(server.commands).toEqual(['show_next', 'reboot', 'clear_screen', 'whistle', 'sleep']);
    expect(server.requests['/showNext']).toEqual(1);
    expect(server.requests['/whistle']).toEqual(1);
  });

  test('a failed command resolves to false', async () => {
    server = start();
    server.failWith(503);
    const client = new Client(server.host);

    await expect(client.sendCommand('reboot')).resolves.toBe(false);
  });

  test('update settings posts the full payload', async () => {
    server = start();
    const client = new Client(server.host);
    const payload = {name: 'Kitchen', sleep_duration: 43200, max_idle: -1, idx_wake_sens: 5};

    await expect(client.updateSettings(payload)).resolves.toBe(true);
    expect(server.settingsUpdates).toEqual([payload]);
    expect(server.device.name).toEqual('Kitchen');
  });

  test('a failed settings update resolves to false', async () => {
    server = start();
    server.failWith(500);
    const client = new Client(server.host);

    await expect(client.updateSettings({
      name: 'Kitchen', sleep_duration: 43200, max_idle: 60, idx_wake_sens: 2,
    })).resolves.toBe(false);
  });
});

describe('toDeviceState', () => {
  test('fills in fields the device left out', () => {
    const state = toDeviceState({battery: 40, width: 1200, height: 1600});
    expect(state.battery).toEqual(40);
    expect(state.name).toEqual('E-Ink Canvas');
    expect(state.sleep_duration).toEqual(86400);
    expect(state.max_idle).toEqual(300);
    expect(state.idx_wake_sens).toEqual(3);
    expect(state.image).toEqual('');
    expect(state.fs_ready).toBe(false);
  });

  test('keeps the never-sleep sentinel', () => {
    expect(toDeviceState({max_idle: -1}).max_idle).toEqual(-1);
  });
});
