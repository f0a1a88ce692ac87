// Telegram sendMessage rejects text over 4096 chars; Twilio caps WhatsApp bodies at 1600.
export const MAX_TELEGRAM_CHARS = 4096;
export const MAX_WHATSAPP_CHARS = 1600;
