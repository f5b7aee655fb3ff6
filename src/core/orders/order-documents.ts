/**
 * GraphQL documents used by the order flows.
 */

const MONEY = 'shopMoney { amount currencyCode }';

export const ORDER_SUMMARY_FIELDS = `
  id
  name
  email
  createdAt
  displayFinancialStatus
  displayFulfillmentStatus
  totalPriceSet { ${MONEY} }
  subtotalPriceSet { ${MONEY} }
  totalTaxSet { ${MONEY} }
  totalDiscountsSet { ${MONEY} }
  taxLines { title rate ratePercentage priceSet { ${MONEY} } }
  discountApplications(first: 20) {
    nodes {
      __typename
      value {
        __typename
        ... on MoneyV2 { amount currencyCode }
        ... on PricingPercentageValue { percentage }
      }
      ... on DiscountCodeApplication { code }
      ... on ManualDiscountApplication { title }
      ... on AutomaticDiscountApplication { title }
      ... on ScriptDiscountApplication { title }
    }
  }
  lineItems(first: 250) {
    nodes {
      id
      title
      quantity
      variant { id }
      originalUnitPriceSet { ${MONEY} }
      discountedUnitPriceSet { ${MONEY} }
      taxLines { title rate ratePercentage priceSet { ${MONEY} } }
      customAttributes { key value }
    }
  }
`;

export const DRAFT_ORDER_CREATE = `
  mutation CreateDraftOrder($input: DraftOrderInput!) {
    draftOrderCreate(input: $input) {
      draftOrder { id name }
      userErrors { field message }
    }
  }
`;

export const DRAFT_ORDER_COMPLETE = `
  mutation CompleteDraftOrder($id: ID!, $paymentPending: Boolean) {
    draftOrderComplete(id: $id, paymentPending: $paymentPending) {
      draftOrder { id name }
      userErrors { field message }
    }
  }
`;

export const DRAFT_ORDER_ORDER = `
  query DraftOrderOrder($id: ID!) {
    node(id: $id) {
      ... on DraftOrder { id name order { id name } }
    }
  }
`;

export const ORDER_CREATE = `
  mutation CreateOrder($order: OrderCreateOrderInput!) {
    orderCreate(order: $order) {
      order { ${ORDER_SUMMARY_FIELDS} }
      userErrors { field message }
    }
  }
`;

export const ORDER_SUMMARY = `
  query OrderSummary($id: ID!) {
    order(id: $id) { ${ORDER_SUMMARY_FIELDS} }
  }
`;

export const ORDER_EDIT_BEGIN = `
  mutation BeginOrderEdit($id: ID!) {
    orderEditBegin(id: $id) {
      calculatedOrder {
        id
        lineItems(first: 250) { nodes { id quantity } }
      }
      userErrors { field message }
    }
  }
`;

export const ORDER_EDIT_ADD_LINE_ITEM_DISCOUNT = `
  mutation AddLineItemDiscount($id: ID!, $lineItemId: ID!, $discount: OrderEditAppliedDiscountInput!) {
    orderEditAddLineItemDiscount(id: $id, lineItemId: $lineItemId, discount: $discount) {
      calculatedLineItem { id }
      userErrors { field message }
    }
  }
`;

export const ORDER_EDIT_COMMIT = `
  mutation CommitOrderEdit($id: ID!, $notifyCustomer: Boolean, $staffNote: String) {
    orderEditCommit(id: $id, notifyCustomer: $notifyCustomer, staffNote: $staffNote) {
      order { ${ORDER_SUMMARY_FIELDS} }
      userErrors { field message }
    }
  }
`;

export const FULFILLMENT_ORDERS = `
  query FulfillmentOrders($id: ID!) {
    order(id: $id) {
      id
      name
      fulfillmentOrders(first: 10) {
        nodes {
          id
          status
          requestStatus
          assignedLocation { name location { id } }
          deliveryMethod { methodType }
          lineItems(first: 50) {
            nodes {
              id
              remainingQuantity
              totalQuantity
              lineItem { id title }
            }
          }
        }
      }
    }
  }
`;
