import {
  CountryEntry,
  CountryListField,
} from "../config/location-config";

/**
 * Country code table reshaped into `{ value: name }` maps for select
 * inputs.
 */
export class CountryList {
  constructor(
    private readonly countries: readonly CountryEntry[],
    private readonly defaults: { value: CountryListField; name: CountryListField }
  ) {}

  build(
    valueField?: CountryListField,
    nameField?: CountryListField
  ): Record<string, string> {
    const value = valueField ?? this.defaults.value;
    const name = nameField ?? this.defaults.name;

    const list: Record<string, string> = {};
    for (const country of this.countries) {
      list[country[value]] = country[name];
    }
    return list;
  }
}
