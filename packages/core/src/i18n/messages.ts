import type { CartSnapshot, Language, OrderReceipt, OrderStatus, SizeCode } from '../types/index.js';

export const CURRENCY = 'EGP';

export interface MessageCatalog {
  askItem: string;
  askSize(item: string, options: string): string;
  sizeOption(label: string, size: SizeCode, price: number): string;
  itemNotFound(item: string): string;
  needMore(fields: string[]): string;
  askRemoveItem(itemNames: string[]): string;
  nothingToRemove: string;
  notInCart(query: string, itemNames: string[]): string;
  askOrderId: string;
  askQuantity(item: string): string;
  askAddress: string;
  askPhone: string;
  emptyItemName: string;
  menuItemNotFound(item: string): string;
  similarItems(query: string, names: string[]): string;
  outOfStock(item: string): string;
  noSizes(item: string): string;
  sizeNotOffered(size: SizeCode, offered: SizeCode[]): string;
  sizeUnavailable(size: SizeCode, item: string): string;
  suggestAlternative(original: string, item: string, size: SizeCode | null): string;
  nothingToConfirm: string;
  suggestionExpired: string;
  suggestionAdded(quantity: number, size: SizeCode, item: string): string;
  rejectedSuggestion: string;
  rejectedNothing: string;
  cartCleared: string;
  emptyCart: string;
  cartSummary(cart: CartSnapshot): string;
  orderPlaced(order: OrderReceipt): string;
  orderStatus(orderId: number, status: OrderStatus, total: number): string;
  orderNotFound(orderId: string): string;
  batchAdded(count: number, lines: string[]): string;
  batchPartialFailure(failures: string[]): string;
  batchAllFailed(failures: string[]): string;
  recommendationsHeader: string;
  commandHint: string;
  apology: string;
}

const en: MessageCatalog = {
  askItem: 'What would you like to order? Please tell me the item name.',
  askSize: (item, options) => `What size would you like for ${item}?\n${options}`,
  sizeOption: (label, size, price) => `  • ${label} (${size}) - ${price} ${CURRENCY}`,
  itemNotFound: (item) => `Sorry, I couldn't find '${item}' in our menu. Could you check the name?`,
  needMore: (fields) => `I need more information: ${fields.join(', ')}`,
  askRemoveItem: (names) => `Which item would you like to remove? Your cart has: ${names.join(', ')}`,
  nothingToRemove: "Your cart is empty. There's nothing to remove.",
  notInCart: (query, names) => `'${query}' not found in cart. You have: ${names.join(', ')}`,
  askOrderId: "I need your order number to track it. What's your order number?",
  askQuantity: (item) => `How many ${item} would you like?`,
  askAddress: "What's your delivery address?",
  askPhone: "What's your phone number?",
  emptyItemName: 'Item name cannot be empty',
  menuItemNotFound: (item) => `'${item}' not found in menu`,
  similarItems: (query, names) => `'${query}' not found. Did you mean: ${names.join(', ')}?`,
  outOfStock: (item) => `${item} is currently out of stock`,
  noSizes: (item) => `${item} has no available sizes`,
  sizeNotOffered: (size, offered) => `Size ${size} not available. Try: ${offered.join(', ')}`,
  sizeUnavailable: (size, item) => `${size} size for ${item} is currently unavailable`,
  suggestAlternative: (original, item, size) =>
    `I couldn't find '${original}'. Did you mean ${item}${size ? ` (${size})` : ''}? ` +
    "Say 'yes' to add it or 'no' to pick something else.",
  nothingToConfirm: "I'm not sure what you're confirming. Could you please be more specific?",
  suggestionExpired: 'That suggestion has expired. What would you like to order?',
  suggestionAdded: (quantity, size, item) => `✅ Added ${quantity}x ${size} ${item} to your cart!`,
  rejectedSuggestion: 'No problem! What would you like to order instead?',
  rejectedNothing: 'Okay! How can I help you?',
  cartCleared: 'Cart cleared! Ready for a new order 🛒',
  emptyCart: 'Your cart is empty',
  cartSummary: (cart) =>
    cart.items.length === 0
      ? 'Your cart is empty'
      : [
          'Current Cart:',
          ...cart.items.map(
            (line) => `  • ${line.itemName} (${line.size}) x${line.quantity} = ${line.subtotal} ${CURRENCY}`
          ),
          '',
          `Total: ${cart.totalPrice} ${CURRENCY}`,
        ].join('\n'),
  orderPlaced: (order) =>
    [
      '✅ Order placed successfully!',
      '',
      ...order.items.map(
        (line) => `• ${line.quantity}x ${line.size} ${line.name} - ${line.subtotal} ${CURRENCY}`
      ),
      '',
      `💰 Total: ${order.totalPrice} ${CURRENCY}`,
      `📦 Order ID: #${order.orderId}`,
      '',
      'Your delicious pizza will be ready in 30-40 minutes. Thank you for your order! 🍕',
    ].join('\n'),
  orderStatus: (orderId, status, total) => `Order #${orderId} is ${status}. Total: ${total} ${CURRENCY}`,
  orderNotFound: (orderId) => `I couldn't find order #${orderId}.`,
  batchAdded: (count, lines) => `Added ${count} items to cart: ${lines.join(', ')}`,
  batchPartialFailure: (failures) => `Couldn't add: ${failures.join(', ')}`,
  batchAllFailed: (failures) => `Couldn't add any items:\n${failures.map((f) => `  • ${f}`).join('\n')}`,
  recommendationsHeader: '🎯 Recommendations for you:',
  commandHint:
    "I understand your message, but I need more specific menu commands. Try: 'add [item] [size]', 'show cart', or 'checkout'",
  apology: 'Sorry, something went wrong on our side. Please try again.',
};

const ar: MessageCatalog = {
  askItem: 'تحب تطلب إيه؟ قولي اسم الصنف من فضلك.',
  askSize: (item, options) => `تحب ${item} بأي حجم؟\n${options}`,
  sizeOption: (label, size, price) => `  • ${label} (${size}) - ${price} ${CURRENCY}`,
  itemNotFound: (item) => `آسف، مش لاقي '${item}' في المنيو. ممكن تتأكد من الاسم؟`,
  needMore: (fields) => `محتاج معلومات أكتر: ${fields.join('، ')}`,
  askRemoveItem: (names) => `عايز تشيل أنهي صنف؟ السلة فيها: ${names.join('، ')}`,
  nothingToRemove: 'السلة فاضية، مفيش حاجة تتشال.',
  notInCart: (query, names) => `'${query}' مش موجود في السلة. السلة فيها: ${names.join('، ')}`,
  askOrderId: 'محتاج رقم الطلب علشان أتابعه. رقم طلبك كام؟',
  askQuantity: (item) => `عايز كام ${item}؟`,
  askAddress: 'عنوان التوصيل إيه؟',
  askPhone: 'رقم تليفونك كام؟',
  emptyItemName: 'لازم تكتب اسم الصنف',
  menuItemNotFound: (item) => `'${item}' مش موجود في المنيو`,
  similarItems: (query, names) => `مش لاقي '${query}'. قصدك: ${names.join('، ')}؟`,
  outOfStock: (item) => `${item} خلصان دلوقتي`,
  noSizes: (item) => `${item} مفيش منه أحجام متاحة`,
  sizeNotOffered: (size, offered) => `الحجم ${size} مش متاح. جرب: ${offered.join('، ')}`,
  sizeUnavailable: (size, item) => `${item} بحجم ${size} مش متاح دلوقتي`,
  suggestAlternative: (original, item, size) =>
    `مش لاقي '${original}'. قصدك ${item}${size ? ` (${size})` : ''}؟ قول 'نعم' علشان أضيفه أو 'لا' تختار حاجة تانية.`,
  nothingToConfirm: 'مش متأكد إنت بتأكد على إيه. ممكن توضح أكتر؟',
  suggestionExpired: 'الاقتراح ده انتهى. تحب تطلب إيه؟',
  suggestionAdded: (quantity, size, item) => `✅ تم إضافة ${quantity}x ${size} ${item} للسلة!`,
  rejectedSuggestion: 'ولا يهمك! تحب تطلب إيه بدل كده؟',
  rejectedNothing: 'تمام! أقدر أساعدك إزاي؟',
  cartCleared: 'تم تفريغ السلة! جاهزين لطلب جديد 🛒',
  emptyCart: 'السلة فاضية',
  cartSummary: (cart) =>
    cart.items.length === 0
      ? 'السلة فاضية'
      : [
          'السلة الحالية:',
          ...cart.items.map(
            (line) => `  • ${line.itemName} (${line.size}) x${line.quantity} = ${line.subtotal} ${CURRENCY}`
          ),
          '',
          `المجموع: ${cart.totalPrice} ${CURRENCY}`,
        ].join('\n'),
  orderPlaced: (order) =>
    [
      '✅ تم تأكيد الطلب!',
      '',
      ...order.items.map(
        (line) => `• ${line.quantity}x ${line.size} ${line.name} - ${line.subtotal} ${CURRENCY}`
      ),
      '',
      `💰 المجموع: ${order.totalPrice} ${CURRENCY}`,
      `📦 رقم الطلب: #${order.orderId}`,
      '',
      'طلبك هيكون جاهز خلال 30-40 دقيقة. شكراً لطلبك! 🍕',
    ].join('\n'),
  orderStatus: (orderId, status, total) => `حالة الطلب #${orderId}: ${status}. المجموع: ${total} ${CURRENCY}`,
  orderNotFound: (orderId) => `مش لاقي الطلب رقم #${orderId}.`,
  batchAdded: (count, lines) => `تم إضافة ${count} أصناف للسلة: ${lines.join('، ')}`,
  batchPartialFailure: (failures) => `مقدرتش أضيف: ${failures.join('، ')}`,
  batchAllFailed: (failures) => `مقدرتش أضيف أي صنف:\n${failures.map((f) => `  • ${f}`).join('\n')}`,
  recommendationsHeader: '🎯 اقتراحات ليك:',
  commandHint: "فهمت رسالتك، بس محتاج أوامر أوضح. جرب: 'ضيف [الصنف] [الحجم]' أو 'اعرض الطلب' أو 'ادفع'",
  apology: 'آسف، حصلت مشكلة عندنا. حاول تاني من فضلك.',
};

const CATALOGS: Record<Language, MessageCatalog> = { en, ar };

export function messagesFor(language: Language): MessageCatalog {
  return CATALOGS[language];
}
