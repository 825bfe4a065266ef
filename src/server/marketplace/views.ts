// JSON views. bigint amounts are rendered as decimal strings.

import type { PurchaseQuoteV1 } from "../../market/marketplace.v1";
import type { ResaleQuoteV1 } from "../../market/resaleMarket.v1";
import type { GameV1, LicenseInstanceV1, LicenseV1, ResellerListingV1 } from "../../market/types.v1";

export function licenseView(license: LicenseV1) {
  return {
    licenseId: license.licenseId,
    gameId: license.gameId,
    name: license.name,
    thumbnailUrl: license.thumbnailUrl,
    shortDescriptions: license.shortDescriptions,
    publisherPrice: license.publisherPrice.toString(),
    discountRate: license.discountRate,
    royaltyRate: license.royaltyRate,
    permitResale: license.permitResale,
    limitAuthCount: license.limitAuthCount,
  };
}

export function gameView(game: GameV1) {
  return {
    gameId: game.gameId,
    metadata: game.metadata,
    saleLocked: game.saleLocked,
    licenses: game.licenseOrder.map((id) => {
      const license = game.licenses.get(id);
      return license ? licenseView(license) : null;
    }),
  };
}

export function instanceView(instance: LicenseInstanceV1) {
  return { ...instance };
}

export function listingView(listing: ResellerListingV1) {
  return {
    listingId: listing.listingId,
    resellerName: listing.resellerName,
    description: listing.description,
    price: listing.price.toString(),
    instance: instanceView(listing.instance),
  };
}

export function purchaseQuoteView(q: PurchaseQuoteV1) {
  return {
    gameId: q.gameId,
    licenseId: q.licenseId,
    publisherPriceUsd: q.publisherPriceUsd.toString(),
    effectivePriceUsd: q.effectivePriceUsd.toString(),
    price: q.price.toString(),
    platformFee: q.platformFee.toString(),
    publisherProceeds: q.publisherProceeds.toString(),
  };
}

export function resaleQuoteView(q: ResaleQuoteV1) {
  return {
    listingId: q.listingId,
    priceUsd: q.priceUsd.toString(),
    price: q.price.toString(),
    royalty: q.royalty.toString(),
    sellerPayout: q.sellerPayout.toString(),
  };
}
