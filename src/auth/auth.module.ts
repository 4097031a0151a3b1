import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { JwtStrategy } from './jwt.strategy';

// Tokens are issued elsewhere; this service only verifies them.
@Module({
    imports: [PassportModule],
    providers: [JwtStrategy],
})
export class AuthModule { }
