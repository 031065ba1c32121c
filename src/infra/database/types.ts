import type { ColumnType, Generated } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Database-generated timestamp: optional on insert
export type GeneratedTimestamp = ColumnType<Date, Date | string | undefined, Date | string>;

// Users Table
export interface Users {
  id: string; // UUID
  email: string;
  password_hash: string | null;
  is_active: Generated<boolean>;
  created_at: GeneratedTimestamp;
}

// Sessions Table
export interface Sessions {
  id: string; // UUID
  user_id: string;
  token: string;
  expires_at: Timestamp;
  created_at: GeneratedTimestamp;
}

// Frogols Table (public profiles)
export interface Frogols {
  id: string; // UUID
  user_id: string;
  slug: string;
  display_name: string | null;
  theme: string | null;
  avatar_url: string | null;
  bio: string | null;
  created_at: GeneratedTimestamp;
}

// Links Table
export interface Links {
  id: string; // UUID
  frogol_id: string;
  url: string;
  label: string;
  sort_order: number;
  is_active: Generated<boolean>;
  kind: Generated<string>;
  created_at: GeneratedTimestamp;
}

// Clicks Table (append-only)
export interface Clicks {
  id: string; // UUID
  link_id: string;
  ip_address: string | null;
  user_agent: string | null;
  created_at: GeneratedTimestamp;
}

// Leads Table
export interface Leads {
  id: string; // UUID
  frogol_id: string;
  email: string;
  source: string | null;
  score: number | null;
  message: string | null;
  created_at: GeneratedTimestamp;
}

// Frogol Avatar Images Table
export interface FrogolAvatarImages {
  id: string; // UUID
  frogol_id: string;
  image_filename: string;
  created_at: GeneratedTimestamp;
}

export interface Database {
  users: Users;
  sessions: Sessions;
  frogols: Frogols;
  links: Links;
  clicks: Clicks;
  leads: Leads;
  frogol_avatar_images: FrogolAvatarImages;
}
