export type AdminAccessLevel = 'staff' | 'super';

// 1:1 with users
export interface Admin {
  id: number;
  user_id: number;
  access_level: AdminAccessLevel;
  created_at: Date;
  updated_at: Date;
}

export interface CreateAdminInput {
  user_id: number;
  access_level?: AdminAccessLevel; // default: 'staff'
}

export interface UpdateAdminInput {
  access_level?: AdminAccessLevel;
}

export interface AdminFilter {
  access_level: AdminAccessLevel;
}
