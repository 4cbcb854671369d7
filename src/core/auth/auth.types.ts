import { Request } from 'express';
import { StaffRole } from '../../modules/staff/entities/staff-user.entity';

export interface StaffPrincipal {
  id: number;
  username: string;
  role: StaffRole;
}

export interface AuthenticatedRequest extends Request {
  staff?: StaffPrincipal;
}
