export interface MockDiaryEntry {
  id: number;
  title: string;
  description: string | null;
  date: Date;
}

export interface MockDiaryImage {
  id: number;
  entryId: number;
  createdAt: Date;
}

export function createMockEntry(overrides: Partial<MockDiaryEntry> = {}): MockDiaryEntry {
  return {
    id: 1,
    title: 'Morning walk',
    description: 'Walked along the river before work.',
    date: new Date('2024-05-01T08:30:00.000Z'),
    ...overrides,
  };
}

export function createMockImage(overrides: Partial<MockDiaryImage> = {}): MockDiaryImage {
  return {
    id: 1,
    entryId: 1,
    createdAt: new Date('2024-05-01T09:00:00.000Z'),
    ...overrides,
  };
}

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];

/**
 * Bytes that start like a PNG file, padded with a repeating pattern up to `size`.
 */
export function createImageBytes(size = 64): Buffer {
  const bytes = Buffer.alloc(size);
  for (let i = 0; i < size; i++) {
    bytes[i] = i < PNG_SIGNATURE.length ? PNG_SIGNATURE[i] : i % 251;
  }
  return bytes;
}
