// noinspection HttpUrlsUsage

import {createServer, IncomingMessage, ServerResponse} from 'node:http';
import {DeviceState, SettingsPayload} from '../canvas/client';

export type FakeDevice = { -readonly [K in keyof DeviceState]: DeviceState[K] };

interface RespondWith {
  success: () => void;
  error500: () => void;
  notJson: () => void;
}

interface DeviceInfoRequests {
  length: number;
  respondWith: RespondWith;
}

export type FakeServerOptions = {
  // park /deviceInfo requests until the test answers them
  holdDeviceInfo?: boolean;
};

export type FakeServer = {
  host: string;
  stop: () => Promise<string>;
  waitForARequest: (count?: number) => Promise<void>;
  requests: Record<string, number>;
  device: FakeDevice;
  deviceInfoRequests: DeviceInfoRequests;
  commands: string[];
  settingsUpdates: unknown[];
  failWith: (status: number | null) => void;
};

export function fakeDevice(): FakeDevice {
  return {
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
  };
}

function parseBody(req: InstanceType<typeof IncomingMessage>): Promise<string> {
  let requestBody: string = '';
  return new Promise((resolve, reject) => {
    req.on('data', (chunk) => {
      requestBody += chunk;
    });
    req.on('end', () => {
      resolve(requestBody);
    });
    req.on('error', (err) => {
      reject(err);
    });
  });
}

function sendJson(res: ServerResponse, body: unknown) {
  res.statusCode = 200;
  res.setHeader('Content-Type', 'application/json');
  res.end(JSON.stringify(body));
}

const commandRoutes: Record<string, string> = {
  'POST /showNext': 'show_next',
  'POST /reboot': 'reboot',
  'POST /clearScreen': 'clear_screen',
  'GET /whistle': 'whistle',
  'POST /sleep': 'sleep',
};

export function start(options: FakeServerOptions = {}): FakeServer {
  const hostname = '127.0.0.1';
  const port = Math.floor(Math.random() * 1000) + 12000;

  const device = fakeDevice();
  const requestCounts: Record<string, number> = {};
  const heldRequests: ServerResponse[] = [];
  const commands: string[] = [];
  const settingsUpdates: unknown[] = [];
  let handled = 0;
  let failureStatus: number | null = null;

  const server = createServer((req, res) => {
    if (req.url) {
      requestCounts[req.url] = (requestCounts[req.url] ?? 0) + 1;
    }
    handled += 1;
    if (failureStatus !== null) {
      res.statusCode = failureStatus;
      res.end();
      return;
    }
    if (req.url === '/deviceInfo' && req.method === 'GET') {
      if (options.holdDeviceInfo) {
        heldRequests.push(res);
        return;
      }
      sendJson(res, device);
      return;
    }
    if (req.url === '/settings' && req.method === 'POST') {
      parseBody(req).then(requestBody => {
        const update: SettingsPayload = JSON.parse(requestBody);
        settingsUpdates.push(update);
        Object.assign(device, update);
        sendJson(res, {status: 'ok'});
      }).catch(() => {
        res.statusCode = 400;
        res.end();
      });
      return;
    }
    const command = commandRoutes[`${req.method} ${req.url}`];
    if (command) {
      commands.push(command);
      sendJson(res, {status: 'ok'});
      return;
    }

    res.statusCode = 404;
    res.end('');
  });

  server.listen(port, hostname, () => {

  });

  const respondToHeld = (respond: (res: ServerResponse) => void) => {
    heldRequests.splice(0).forEach(respond);
  };

  return {
    host: `http://${hostname}:${port}`,
    stop: () => {
      server.closeAllConnections();
      return new Promise((resolve) => {
        server.close(() => {
          resolve('closed');
        });
      });
    },
    requests: requestCounts,
    device,
    commands,
    settingsUpdates,
    failWith: (status: number | null) => {
      failureStatus = status;
    },
    deviceInfoRequests: {
      get length() {
        return heldRequests.length;
      },
      respondWith: {
        success: () => respondToHeld(res => sendJson(res, device)),
        error500: () => respondToHeld(res => {
          res.statusCode = 500;
          res.end();
        }),
        notJson: () => respondToHeld(res => {
          res.statusCode = 200;
          res.setHeader('Content-Type', 'text/plain');
          res.end('booting');
        }),
      },
    },
    waitForARequest: (count: number = 1) => {
      return new Promise((resolve) => {
        const timeout = setInterval(() => {
          if (handled >= count) {
            clearInterval(timeout);
            resolve();
          }
        }, 10);
      });
    },
  };
}
