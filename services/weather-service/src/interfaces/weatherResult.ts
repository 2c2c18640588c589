import { WeatherErrorKind } from '../errors';
import { CurrentWeather, ForecastRange } from './weather';

export type WeatherCommand = 'current' | 'forecast' | 'override';

export type WeatherResult =
    | {
        status: 'success';
        requestId: string | null;
        command: WeatherCommand;
        data: CurrentWeather | ForecastRange;
        timestamp: number;
    }
    | {
        status: 'error';
        requestId: string | null;
        command: WeatherCommand;
        error: {
            kind: WeatherErrorKind;
            message: string;
            detail?: Record<string, unknown>;
        };
        timestamp: number;
    };
