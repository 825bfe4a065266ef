// scripts/conservation_certify.ts
// Runs 100 seeded market sessions (registrations, purchases, activations,
// listings, resales, delists, withdrawals) and checks after every step that
// value paid in equals value held plus value withdrawn.
// Run: npx -y tsx scripts/conservation_certify.ts

import type { PublisherCapability } from "../src/auth/capability.v1";
import { loadMarketConfigDefault } from "../src/config/marketConfig.v1";
import { isMarketError } from "../src/market/errors.v1";
import { sequentialIds } from "../src/market/ids.v1";
import { MarketHostV1 } from "../src/market/marketHost.v1";
import { makeLogger } from "../src/observability/logger.v1";

const logger = makeLogger({ script: "conservation_certify" });

function seededRng(seed: number) {
  let s = seed >>> 0;
  return () => {
    s = (Math.imul(s, 1664525) + 1013904223) >>> 0;
    return s / 0x1_0000_0000;
  };
}

function pick<T>(rng: () => number, items: T[]): T | undefined {
  return items.length === 0 ? undefined : items[Math.floor(rng() * items.length)];
}

function runSession(seed: number): string[] {
  const config = loadMarketConfigDefault();
  const host = MarketHostV1.create({ config, logger, ids: sequentialIds(), clock: () => "1970-01-01T00:00:00.000Z" });
  const rng = seededRng(seed);
  const users = ["0xa1", "0xb2", "0xc3", "0xd4"];
  const publisher = "0xpub";
  const diffs: string[] = [];

  for (const u of [...users, publisher]) host.wallets.topUp(u, 10n ** 15n);

  const games: Array<{ gameId: string; cap: PublisherCapability; licenseIds: string[] }> = [];

  for (let g = 0; g < 3; g++) {
    const { game, publisherCap } = host.registerGame(publisher, {
      gameId: `game-${seed}-${g}`,
      metadata: {
        name: `Game ${g}`,
        thumbnailUrl: "",
        imageUrls: [],
        videoUrls: [],
        shortDescriptions: { codes: ["en"], texts: [`Game ${g}`] },
        genres: [],
        developer: "dev",
        publisher: "pub",
        languages: ["en"],
        platforms: ["pc"],
        systemRequirements: "",
      },
      saleLocked: false,
    });

    const licenseIds: string[] = [];
    for (let l = 0; l < 2; l++) {
      const license = host.marketplace.createLicense(publisherCap, game.gameId, {
        name: `License ${l}`,
        thumbnailUrl: "",
        shortDescriptions: { codes: [], texts: [] },
        publisherPrice: BigInt(1 + Math.floor(rng() * 20_000)),
        discountRate: Math.floor(rng() * 10_001),
        royaltyRate: Math.floor(rng() * 10_001),
        permitResale: rng() < 0.8,
        limitAuthCount: 1 + Math.floor(rng() * 3),
      });
      licenseIds.push(license.licenseId);
    }
    games.push({ gameId: game.gameId, cap: publisherCap, licenseIds });
  }

  for (let step = 0; step < 200; step++) {
    const actor = pick(rng, users) ?? users[0];
    const roll = rng();

    try {
      if (roll < 0.35) {
        const game = pick(rng, games);
        const licenseId = game ? pick(rng, game.licenseIds) : undefined;
        if (game && licenseId) host.purchase(actor, { gameId: game.gameId, licenseId });
      } else if (roll < 0.5) {
        const inst = pick(rng, host.inventory.listByOwner(actor));
        if (inst) host.authenticate(actor, inst.instanceId);
      } else if (roll < 0.65) {
        const inst = pick(rng, host.inventory.listByOwner(actor));
        if (inst) {
          host.list(actor, {
            instanceId: inst.instanceId,
            resellerName: actor,
            description: "",
            price: BigInt(Math.floor(rng() * 15_000)),
          });
        }
      } else if (roll < 0.8) {
        const listing = pick(rng, host.resale.listListings());
        if (listing) host.resell(actor, { listingId: listing.listingId });
      } else if (roll < 0.85) {
        const listing = pick(rng, host.resale.listListings().filter((l) => l.instance.owner === actor));
        if (listing) host.delist(actor, listing.listingId);
      } else if (roll < 0.9) {
        host.withdrawPayout(actor);
      } else if (roll < 0.95) {
        const game = pick(rng, games);
        if (game) host.withdrawGameProceeds(publisher, game.cap, game.gameId);
      } else {
        host.withdrawPurchaseFees(publisher, host.platformCap);
      }
    } catch (e) {
      // Rejected operations are expected (limits, empty pools); anything else is a defect.
      if (!isMarketError(e)) throw e;
    }

    const acct = host.accounting();
    if (!acct.balanced) {
      diffs.push(`step ${step}: paidIn ${acct.paidIn} != held ${acct.held} + withdrawn ${acct.withdrawn}`);
      break;
    }
  }

  return diffs;
}

function main() {
  const failures: Array<{ seed: number; diffs: string[] }> = [];

  for (let seed = 1; seed <= 100; seed++) {
    const diffs = runSession(seed);
    if (diffs.length > 0) failures.push({ seed, diffs });
  }

  if (failures.length > 0) {
    console.error(`Conservation CERT FAIL: ${failures.length}/100 sessions unbalanced`);
    for (const f of failures.slice(0, 10)) {
      console.error(`- Seed ${f.seed}: ${f.diffs.join("; ")}`);
    }
    process.exit(1);
  }

  console.log("Conservation CERT PASS: 100/100 sessions balanced after every step");
  process.exit(0);
}

main();
