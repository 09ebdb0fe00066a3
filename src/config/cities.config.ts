// Checked in this order; the first one found in a description wins.
export const KNOWN_CITIES: readonly string[] = [
  'karachi',
  'lahore',
  'islamabad',
  'rawalpindi',
  'faisalabad',
  'multan',
  'peshawar',
  'quetta',
  'sialkot',
  'gujranwala',
  'hyderabad',
  'bahawalpur',
];
