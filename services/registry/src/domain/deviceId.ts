/** Two spellings that differ only by case or surrounding whitespace name the same device. */
export const normalizeDeviceId = (value: string) => value.trim().toLowerCase();
