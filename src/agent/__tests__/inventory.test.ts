import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, expect, it } from 'vitest';
import { InvalidTargetError } from '../core/errors.js';
import type { DeviceTarget } from '../core/types.js';
import { InventoryInputValidator, JsonDeviceInventory, matchDevices } from '../knowledge/inventory.js';
import { silentLogger } from './fakes.js';

const inventory: DeviceTarget[] = [
  { name: 'xrd-pe1', role: 'PE' },
  { name: 'xrd-pe2', role: 'PE' },
  { name: 'xrd-p1', role: 'P' },
  { name: 'xrd-rr1', role: 'RR' },
];

function names(query: string, devices: readonly DeviceTarget[] = inventory): string[] {
  return matchDevices(query, devices).map((device) => device.name);
}

describe('matchDevices', () => {
  it('matches full device names', () => {
    expect(names('check bgp on xrd-pe1')).toEqual(['xrd-pe1']);
  });

  it('matches unambiguous short names in inventory order', () => {
    expect(names('compare pe2 with PE1')).toEqual(['xrd-pe1', 'xrd-pe2']);
  });

  it('does not confuse p1 with pe1', () => {
    expect(names('is p1 healthy?')).toEqual(['xrd-p1']);
  });

  it('selects the whole inventory', () => {
    expect(names('check all devices')).toHaveLength(4);
    expect(names('verify every router')).toHaveLength(4);
    expect(names('check all the devices')).toHaveLength(4);
  });

  it('selects devices by role', () => {
    expect(names('check all PE routers')).toEqual(['xrd-pe1', 'xrd-pe2']);
  });

  it('counts a device listed twice once', () => {
    const doubled: DeviceTarget[] = [{ name: 'xrd-pe1', role: 'PE' }, { name: 'xrd-pe1' }, { name: 'xrd-pe2' }];
    expect(matchDevices('check pe1', doubled)).toEqual([{ name: 'xrd-pe1', role: 'PE' }]);
    expect(names('check all devices', doubled)).toEqual(['xrd-pe1', 'xrd-pe2']);
  });

  it('ignores a short name shared by several devices', () => {
    const shared = [{ name: 'site1-core' }, { name: 'site2-core' }];
    expect(names('check core', shared)).toEqual([]);
  });
});

describe('InventoryInputValidator', () => {
  const validator = new InventoryInputValidator({ listDevices: async () => inventory }, silentLogger());

  it('resolves the devices a query names', async () => {
    await expect(validator.resolveTargets('check xrd-rr1')).resolves.toEqual([{ name: 'xrd-rr1', role: 'RR' }]);
  });

  it('rejects a query that names no known device', async () => {
    const attempt = validator.resolveTargets('check foo');
    await expect(attempt).rejects.toBeInstanceOf(InvalidTargetError);
    await expect(attempt).rejects.toThrow(
      'No device in the inventory matches "check foo". Known devices: xrd-pe1, xrd-pe2, xrd-p1, xrd-rr1'
    );
  });
});

describe('JsonDeviceInventory', () => {
  it('reads and validates the inventory file', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'inventory-'));
    try {
      const file = path.join(dir, 'inventory.json');
      fs.writeFileSync(file, JSON.stringify([{ name: 'xrd-pe1', role: 'PE', profile: 'Cisco IOS XR' }]));
      await expect(new JsonDeviceInventory(file).listDevices()).resolves.toEqual([
        { name: 'xrd-pe1', role: 'PE', profile: 'Cisco IOS XR' },
      ]);

      fs.writeFileSync(file, JSON.stringify([{ role: 'PE' }]));
      await expect(new JsonDeviceInventory(file).listDevices()).rejects.toThrow(/is malformed/);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
