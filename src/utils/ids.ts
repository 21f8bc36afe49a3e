import { v5 as uuidv5 } from 'uuid';

// Stable point ids for texts submitted without an explicit id
export const TEXT_ID_NAMESPACE = 'b3e1f2a4-7c9d-5e8f-a1b2-c3d4e5f6a7b8';

export const textItemId = (text: string): string => uuidv5(text, TEXT_ID_NAMESPACE);
