import { MemberView } from '../../members/dto/register-member.dto';

export interface TrainerMemberDto {
  member: MemberView;
  hasPlan: boolean;
  planCount: number;
}
