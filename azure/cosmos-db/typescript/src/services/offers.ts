/**
 * Azure Cosmos DB - Offer Service
 *
 * Offers carry the provisioned throughput of a collection.
 */

import { z } from "zod";
import { offerLink, requireCollection } from "../config/index.js";
import { ValidationError } from "../errors.js";
import { OfferInfo, RequestOptions, ResourceResponse, offerSchema } from "../types/index.js";
import type { CollectionService } from "./collections.js";
import type { CollectionTarget } from "./documents.js";
import { ResourceRequestor } from "./requestor.js";

const listOffersSchema = z.object({
  Offers: z.array(offerSchema),
});

/** Lowest throughput a collection can be provisioned with. */
export const MIN_THROUGHPUT = 400;

/** Highest throughput of a single-partition collection. */
export const SINGLE_PARTITION_MAX_THROUGHPUT = 10000;

export const THROUGHPUT_STEP = 100;

/**
 * Check a requested throughput against the collection's current offer.
 */
export function validateThroughput(throughput: number, offer: OfferInfo, collectionId: string): void {
  if (!Number.isInteger(throughput)) {
    throw new ValidationError('"throughput" must be an integer value.', "InvalidThroughput");
  }
  if (throughput % THROUGHPUT_STEP !== 0) {
    throw new ValidationError('"throughput" must be a multiple of 100.', "InvalidThroughput");
  }
  if (throughput < MIN_THROUGHPUT) {
    throw new ValidationError(
      `The minimum throughput supported is ${MIN_THROUGHPUT} RU/s`,
      "InvalidThroughput"
    );
  }

  if (offer.offerVersion !== "V2") {
    if (throughput > SINGLE_PARTITION_MAX_THROUGHPUT) {
      throw new ValidationError(
        `Collection "${collectionId}" currently has an offer version of ${offer.offerVersion ?? "V1"}. ` +
          `When switching to a user-defined throughput, the maximum throughput is 10,000.`,
        "InvalidThroughput"
      );
    }
    return;
  }

  const currentThroughput = offer.content?.offerThroughput ?? 0;
  if (currentThroughput <= SINGLE_PARTITION_MAX_THROUGHPUT && throughput > SINGLE_PARTITION_MAX_THROUGHPUT) {
    throw new ValidationError(
      `The maximum throughput for collection "${collectionId}" is 10,000 because it has only one partition.`,
      "InvalidThroughput"
    );
  }
  if (currentThroughput > SINGLE_PARTITION_MAX_THROUGHPUT && throughput <= SINGLE_PARTITION_MAX_THROUGHPUT) {
    throw new ValidationError(
      `The minimum throughput for collection "${collectionId}" is 10,100 because it has multiple partitions.`,
      "InvalidThroughput"
    );
  }
}

export class OfferService {
  private readonly requestor: ResourceRequestor;
  private readonly collections: CollectionService;

  constructor(requestor: ResourceRequestor, collections: CollectionService) {
    this.requestor = requestor;
    this.collections = collections;
  }

  /**
   * List the offers of the account.
   */
  async list(options: RequestOptions = {}): Promise<ResourceResponse<OfferInfo[]>> {
    const response = await this.requestor.sendJson(
      {
        method: "GET",
        resourceType: "offers",
        resourceLink: "",
        path: "offers",
        operation: "list offers",
        options,
      },
      listOffersSchema
    );
    return { ...response, resource: response.resource.Offers };
  }

  /**
   * Replace the provisioned throughput of a collection. The charge includes
   * the collection and offer lookups.
   */
  async setCollectionThroughput(
    throughput: number,
    options: RequestOptions & CollectionTarget = {}
  ): Promise<ResourceResponse<OfferInfo>> {
    const collectionId = requireCollection(this.requestor.getConfig(), options.collectionId);

    const collections = await this.collections.list(options);
    const collection = collections.resource.find((c) => c.id === collectionId);
    if (!collection?._rid) {
      throw new ValidationError(
        `API did not return a collection with ID "${collectionId}"`,
        "CollectionNotFound"
      );
    }

    const offers = await this.list(options);
    const offer = offers.resource.find((o) => o.offerResourceId === collection._rid);
    if (!offer?._rid) {
      throw new ValidationError(
        `API did not return an offer for collection with RID "${collection._rid}"`,
        "OfferNotFound"
      );
    }

    validateThroughput(throughput, offer, collectionId);

    const offerId = offer._rid;
    const body = {
      offerVersion: "V2",
      offerType: "Invalid",
      content: {
        offerThroughput: throughput,
        userSpecifiedThroughput: throughput,
      },
      resource: collection._self,
      offerResourceId: collection._rid,
      id: offerId,
      _rid: offerId,
    };

    const replaced = await this.requestor.sendJson(
      {
        method: "PUT",
        resourceType: "offers",
        resourceLink: offerId.toLowerCase(),
        path: offerLink(offerId),
        operation: "replace offer",
        body: JSON.stringify(body),
        options: { userAgent: options.userAgent, signal: options.signal },
      },
      offerSchema
    );

    return {
      ...replaced,
      requestCharge: collections.requestCharge + offers.requestCharge + replaced.requestCharge,
    };
  }
}
