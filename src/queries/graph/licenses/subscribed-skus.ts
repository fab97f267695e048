import { GraphQueryDefinition } from '../types';

export const subscribedSkusQuery: GraphQueryDefinition = {
  id: 'subscribed_skus',
  query: {
    endpoint: '/subscribedSkus',
    select: ['skuId', 'skuPartNumber']
  }
};
