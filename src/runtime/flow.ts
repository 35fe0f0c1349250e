import type {
  FlowState,
  FlowStepName,
  Intent,
  OperationOutcome,
  SiteCredentials,
} from '../types.js';
import { canReadPrices, type SitePageModel } from '../sites/base.js';

// ─────────────────────────────────────────────────────────────────────────────
// Flow compilation — a multi-step intent becomes an ordered list of page-model
// operations. Each step names the checkout state it reaches; the runner halts
// the flow at the first failing step.
//
//   open → [login] → find_product → add_selected_to_cart → go_to_cart
//        → [verify_price] → [place_order]
// ─────────────────────────────────────────────────────────────────────────────

export type FlowStepId =
  | 'open'
  | 'login'
  | 'find_product'
  | 'add_selected_to_cart'
  | 'go_to_cart'
  | 'verify_price'
  | 'place_order';

export interface FlowStep {
  id: FlowStepId;
  reaches: FlowState;
  run(model: SitePageModel): Promise<OperationOutcome>;
}

export interface CompiledFlow {
  steps: FlowStep[];
  /** Steps left out, with the reason */
  skipped: { step: FlowStepName | FlowStepId; reason: string }[];
}

export interface FlowOptions {
  credentials?: SiteCredentials;
  /** URL to open instead of the site's base URL */
  url?: string;
  /** Whether the target model can read product and cart prices */
  pricesReadable: boolean;
}

const DEFAULT_STEPS: Record<'full_checkout_flow' | 'add_to_cart_flow', FlowStepName[]> = {
  full_checkout_flow: ['login', 'add_to_cart', 'checkout', 'place_order'],
  add_to_cart_flow: ['login', 'add_to_cart'],
};

export function compileFlow(intent: Intent, options: FlowOptions): CompiledFlow {
  const product = intent.entities.product;
  const verify = intent.entities.verify_price === true;
  const names = intent.entities.steps
    ?? (intent.name === 'full_checkout_flow' || intent.name === 'add_to_cart_flow' ? DEFAULT_STEPS[intent.name] : []);

  const steps: FlowStep[] = [openStep(options.url)];
  const skipped: CompiledFlow['skipped'] = [];
  const prices: { product: string | null } = { product: null };
  let cartViewed = false;

  for (const name of names) {
    switch (name) {
      case 'login': {
        const credentials = options.credentials;
        if (!credentials) {
          skipped.push({ step: 'login', reason: 'no credentials configured for this site' });
          break;
        }
        steps.push({
          id: 'login',
          reaches: 'logged_in',
          run: async (model) => {
            await model.openLogin();
            return model.loginWithPassword(credentials);
          },
        });
        break;
      }

      case 'add_to_cart':
        steps.push(
          {
            id: 'find_product',
            reaches: 'result_opened',
            run: async (model) => {
              const searched = product ? await model.search(product) : null;
              const opened = await model.openFirstResult();
              return {
                selector: opened.selector,
                data: { query: product ?? null, ...searched?.data, ...opened.data },
              };
            },
          },
          {
            id: 'add_selected_to_cart',
            reaches: 'added_to_cart',
            run: async (model) => {
              if (verify && canReadPrices(model)) prices.product = await model.productPrice(product);
              return model.addSelectedToCart(product);
            },
          },
          { id: 'go_to_cart', reaches: 'cart_viewed', run: (model) => model.goToCart() },
        );
        cartViewed = true;
        if (verify) {
          if (options.pricesReadable) {
            steps.push(verifyPriceStep(prices, product));
          } else {
            skipped.push({ step: 'verify_price', reason: 'site does not expose prices' });
          }
        }
        break;

      case 'checkout':
        if (!cartViewed) {
          steps.push({ id: 'go_to_cart', reaches: 'cart_viewed', run: (model) => model.goToCart() });
          cartViewed = true;
        }
        break;

      case 'place_order':
        steps.push({ id: 'place_order', reaches: 'order_placed', run: (model) => model.placeOrder() });
        break;
    }
  }

  return { steps, skipped };
}

/** Navigate and clear whatever first-visit overlay the site shows */
export async function openAndDismiss(model: SitePageModel, url?: string): Promise<OperationOutcome> {
  const opened = await model.open(url);
  const popup = await model.dismissPopup();
  return { data: { ...opened.data, ...popup.data } };
}

function openStep(url?: string): FlowStep {
  return { id: 'open', reaches: 'popup_dismissed', run: (model) => openAndDismiss(model, url) };
}

function verifyPriceStep(prices: { product: string | null }, product?: string): FlowStep {
  return {
    id: 'verify_price',
    reaches: 'price_verified',
    run: async (model) => {
      if (!canReadPrices(model)) throw new Error(`Site ${model.site} does not expose prices`);
      const cart = await model.cartPrice(product);
      const listed = prices.product;
      if (listed === null || cart === null) {
        throw new Error(`Price not readable (product: ${listed ?? 'none'}, cart: ${cart ?? 'none'})`);
      }
      if (priceValue(listed) !== priceValue(cart)) {
        throw new Error(`Price mismatch: product ${listed}, cart ${cart}`);
      }
      return { data: { product_price: listed, cart_price: cart, match: true } };
    },
  };
}

/** "$29.99" → 29.99, "Rs. 1,299" → 1299; NaN when no digits */
export function priceValue(text: string): number {
  const match = /\d[\d,]*(\.\d+)?/.exec(text);
  return match ? Number.parseFloat(match[0].replace(/,/g, '')) : Number.NaN;
}
