/**
 * Device inventory and the Input Validator built on it.
 */

import * as fs from 'fs/promises';
import { z } from 'zod';
import type { DeviceInventory, InputValidator } from '../core/contracts.js';
import { InvalidTargetError } from '../core/errors.js';
import type { DeviceTarget } from '../core/types.js';
import { Logger } from '../../utils/logger.js';

export const deviceTargetSchema = z.object({
  name: z.string().trim().min(1),
  role: z.string().optional(),
  profile: z.string().optional(),
});

export const inventorySchema = z.array(deviceTargetSchema);

/**
 * Inventory read from a JSON array of `{ name, role?, profile? }`.
 */
export class JsonDeviceInventory implements DeviceInventory {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async listDevices(): Promise<DeviceTarget[]> {
    const raw = JSON.parse(await fs.readFile(this.filePath, 'utf-8'));
    const parsed = inventorySchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Inventory ${this.filePath} is malformed: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
    }
    return parsed.data;
  }
}

const ALL_DEVICES_RE = /\b(?:all|every)\s+(?:the\s+)?(?:devices?|routers?|nodes?)\b/i;
const ROLE_RE = /\b(?:all|every)\s+([A-Za-z0-9]+)\s+(?:devices?|routers?|nodes?)\b/i;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** True when `term` occurs in `text` as a whole word (hyphens count as word characters). */
function mentions(text: string, term: string): boolean {
  return new RegExp(`(?<![\\w-])${escapeRegExp(term)}(?![\\w-])`, 'i').test(text);
}

/** Drops repeated device names, keeping the first entry of each. */
export function uniqueTargets(targets: readonly DeviceTarget[]): DeviceTarget[] {
  const seen = new Set<string>();
  return targets.filter((target) => {
    if (seen.has(target.name)) return false;
    seen.add(target.name);
    return true;
  });
}

/**
 * Resolves the devices a query refers to:
 *
 * - "all devices" / "every router" selects the whole inventory;
 * - "all PE routers" selects every device with that role;
 * - otherwise each device named in the query, either in full ("xrd-pe1") or
 *   by its last hyphen-separated segment ("pe1") when that is unambiguous.
 *
 * Results keep inventory order and contain no duplicates; a name listed
 * twice in the inventory counts once.
 */
export function matchDevices(userQuery: string, listed: readonly DeviceTarget[]): DeviceTarget[] {
  const inventory = uniqueTargets(listed);
  const roleMatch = userQuery.match(ROLE_RE);
  if (roleMatch) {
    const role = roleMatch[1].toLowerCase();
    const byRole = inventory.filter((device) => device.role?.toLowerCase() === role);
    if (byRole.length > 0) return byRole;
  }
  if (ALL_DEVICES_RE.test(userQuery)) return inventory;

  const shortNames = new Map<string, number>();
  for (const device of inventory) {
    const short = shortName(device.name);
    if (short) shortNames.set(short, (shortNames.get(short) ?? 0) + 1);
  }

  return inventory.filter((device) => {
    if (mentions(userQuery, device.name)) return true;
    const short = shortName(device.name);
    return short !== undefined && shortNames.get(short) === 1 && mentions(userQuery, short);
  });
}

function shortName(name: string): string | undefined {
  const index = name.lastIndexOf('-');
  if (index <= 0 || index === name.length - 1) return undefined;
  return name.slice(index + 1).toLowerCase();
}

export class InventoryInputValidator implements InputValidator {
  private readonly inventory: DeviceInventory;
  private readonly logger: Logger;

  constructor(inventory: DeviceInventory, logger?: Logger) {
    this.inventory = inventory;
    this.logger = logger ?? new Logger('InputValidator');
  }

  async resolveTargets(userQuery: string, signal?: AbortSignal): Promise<DeviceTarget[]> {
    const devices = await this.inventory.listDevices(signal);
    const targets = matchDevices(userQuery, devices);
    if (targets.length === 0) {
      throw new InvalidTargetError(
        userQuery,
        devices.map((device) => device.name)
      );
    }
    this.logger.info(`Resolved ${targets.length} of ${devices.length} device(s)`);
    return targets;
  }
}
