export interface Tier {
  name: string;
  title: string;
  minGift: number;
  maxGift: number | null;  // carried for display, not enforced in the snippet
}

export interface SignatureLocation {
  key: string;
  label: string;
  startTag: string;
  endTag: string;
}
