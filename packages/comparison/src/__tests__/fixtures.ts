export const ADDRESS_1 = '0x1111111111111111111111111111111111111111';
export const ADDRESS_2 = '0x2222222222222222222222222222222222222222';
export const ADDRESS_3 = '0x3333333333333333333333333333333333333333';
