export interface AssetFetchOptions {
    /** Aborts the fetch, including any pending retries */
    signal?: AbortSignal;
}

/**
 * IAssetSource - Port for retrieving raw bytes of remote or local assets.
 * Implementations: HttpAssetSource
 */
export interface IAssetSource {
    /**
     * @param locator http(s) URL, data: URL or a path under the local asset directory
     */
    fetch(locator: string, options?: AssetFetchOptions): Promise<Buffer>;
}
