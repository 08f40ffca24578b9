import type { GeocoderAdapter, GeocoderConfig } from '../types/index.js';
import { ConfigError } from '../utils/errors.js';
import { HttpClient } from '../utils/http-client.js';
import { NominatimGeocoder } from './nominatim.js';

export { NominatimGeocoder, formatLocationLabel } from './nominatim.js';

/**
 * Build the configured geocoder.
 *
 * @throws ConfigError when the provider's credentials are missing: public Nominatim
 *   requires a contact email, LocationIQ an API key
 */
export function createGeocoder(config: GeocoderConfig, httpClient?: HttpClient): GeocoderAdapter {
    switch (config.provider) {
        case 'locationiq':
            if (!config.apiKey) {
                throw new ConfigError('LocationIQ geocoding needs an API key (set LOCATIONIQ_API_KEY or geocoder.apiKey)');
            }
            break;
        case 'nominatim':
            if (!config.email && !config.baseUrl) {
                throw new ConfigError(
                    'The public Nominatim instance needs a contact email (set CITEGEO_GEOCODER_EMAIL or geocoder.email)'
                );
            }
            break;
    }

    return new NominatimGeocoder({
        provider: config.provider,
        baseUrl: config.baseUrl,
        apiKey: config.apiKey,
        email: config.email,
        timeoutMs: config.timeoutMs,
        retry: config.retry,
        httpClient: httpClient ?? new HttpClient({ email: config.email, retry: config.retry, timeout: config.timeoutMs }),
    });
}
