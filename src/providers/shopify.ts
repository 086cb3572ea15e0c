import crypto from 'node:crypto'
import type { Endpoint } from '../oauth2/config.ts'
import {
  OAuth2Provider,
  type OAuth2ProviderOptions,
} from '../oauth2/provider.ts'
import type { OAuth2Session } from '../oauth2/session.ts'
import type { Token } from '../oauth2/token.ts'
import { getJson } from '../plumbing/http.ts'
import { idString, toRawData } from './profile.ts'
import type { Params } from './types/provider.ts'
import type { UserFields } from './types/user.ts'

export const SHOPIFY_API_VERSION = '2024-01'

export const ShopifyScope = {
  readCustomers: 'read_customers',
  writeCustomers: 'write_customers',
  readOrders: 'read_orders',
  writeOrders: 'write_orders',
  readProducts: 'read_products',
  writeProducts: 'write_products',
  readContent: 'read_content',
  writeContent: 'write_content',
  readThemes: 'read_themes',
  writeThemes: 'write_themes',
} as const

const SHOPIFY_HOSTNAME_REGEX =
  /^(([a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])\.)*([A-Za-z0-9]|[A-Za-z0-9][A-Za-z0-9-]*[A-Za-z0-9])$/

export interface ShopifyProviderOptions extends OAuth2ProviderOptions {
  /** Shop subdomain, e.g. `example` for example.myshopify.com. */
  shopName?: string
}

interface ShopifyShop {
  shop?: {
    id?: number
    name?: string
    email?: string
    city?: string
    country?: string
    shop_owner?: string
    myshopify_domain?: string
    plan_display_name?: string
  }
}

const shopHost = (shopName: string): string => `${shopName}.myshopify.com`

const shopEndpoint = (shopName: string): Endpoint => ({
  authUrl: `https://${shopHost(shopName)}/admin/oauth/authorize`,
  tokenUrl: `https://${shopHost(shopName)}/admin/oauth/access_token`,
})

/**
 * Hex HMAC-SHA256 over the callback's code, host, shop, state and
 * timestamp parameters, keyed by the app secret.
 */
export const shopifyCallbackHmac = (params: Params, secret: string): string => {
  const message = ['code', 'host', 'shop', 'state', 'timestamp']
    .map((key) => `${key}=${params.get(key) ?? ''}`)
    .join('&')
  return crypto.createHmac('sha256', secret).update(message).digest('hex')
}

const safeEqual = (a: string, b: string): boolean => {
  const bufferA = Buffer.from(a)
  const bufferB = Buffer.from(b)
  return bufferA.length === bufferB.length && crypto.timingSafeEqual(bufferA, bufferB)
}

export class ShopifyProvider extends OAuth2Provider {
  tokenExtraKeys = ['shop'] as const
  private shopName: string

  constructor(options: ShopifyProviderOptions) {
    const shopName = options.shopName ?? ''
    super(
      {
        name: 'shopify',
        endpoint: shopEndpoint(shopName),
        defaultScopes: [ShopifyScope.readCustomers],
        scopeSeparator: ',',
        refreshTokenAvailable: false,
      },
      options,
    )
    this.shopName = shopName
  }

  setShopName(shopName: string): void {
    this.shopName = shopName
    this.reconfigure(shopEndpoint(shopName))
  }

  async exchangeCode(session: OAuth2Session, params: Params): Promise<Token> {
    if (!safeEqual(shopifyCallbackHmac(params, this.secret), params.get('hmac') ?? '')) {
      throw new Error('Invalid HMAC received')
    }
    const shop = params.get('shop') ?? ''
    if (!SHOPIFY_HOSTNAME_REGEX.test(shop)) {
      throw new Error('Invalid hostname received')
    }
    const token = await super.exchangeCode(session, params)
    return { ...token, raw: { ...token.raw, shop } }
  }

  protected async fetchProfile(session: OAuth2Session): Promise<UserFields> {
    const host = session.extra.shop || shopHost(this.shopName)
    const data = await getJson<ShopifyShop>(
      `https://${host}/admin/api/${SHOPIFY_API_VERSION}/shop.json`,
      {
        ...this.requestContext('fetch shop information'),
        headers: { 'X-Shopify-Access-Token': session.accessToken },
      },
    )
    const shop = data.shop ?? {}
    return {
      rawData: toRawData(data),
      userId: idString(shop.id),
      name: shop.name,
      email: shop.email,
      nickName: shop.shop_owner,
      description: `${shop.myshopify_domain ?? ''} (${shop.plan_display_name ?? ''})`,
      location: `${shop.city ?? ''}, ${shop.country ?? ''}`,
    }
  }
}
