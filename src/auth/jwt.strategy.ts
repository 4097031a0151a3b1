import { ExtractJwt, Strategy } from 'passport-jwt';
import { PassportStrategy } from '@nestjs/passport';
import { Inject, Injectable, UnauthorizedException } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config/app.config';

export interface JwtPayload {
    sub?: string | number;
    username?: string;
}

export interface AuthUser {
    userId: string;
    email?: string;
}

@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy) {
    constructor(@Inject(APP_CONFIG) config: AppConfig) {
        super({
            jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
            ignoreExpiration: false,
            secretOrKey: config.jwtSecret,
        });
    }

    async validate(payload: JwtPayload): Promise<AuthUser> {
        if (payload.sub === undefined || payload.sub === '') {
            throw new UnauthorizedException('Token has no subject');
        }
        return { userId: String(payload.sub), email: payload.username };
    }
}
