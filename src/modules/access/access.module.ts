import { Module } from "@nestjs/common";
import { ACCESS_POLICY } from "./access-policy.interface";
import { RoleAccessPolicy } from "./role-access-policy";

@Module({
  providers: [{ provide: ACCESS_POLICY, useClass: RoleAccessPolicy }],
  exports: [ACCESS_POLICY],
})
export class AccessModule {}
