// AS7343 channel order shared by every reference, sample and persisted payload
export const CHANNEL_LABELS = [
    'F1 405',
    'F2 425',
    'FZ 450',
    'F3 475',
    'F4 515',
    'FY 550',
    'F5 555',
    'FXL 600',
    'F6 640',
    'F7 690',
    'F8 745',
    'VIS',
    'NIR 855',
] as const;

export const CHANNEL_COUNT = CHANNEL_LABELS.length;
